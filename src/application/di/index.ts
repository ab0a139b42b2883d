/**
 * @module wirestack/application/di
 * @description Containers
 */

export type { IContainer, IContainerBuilder } from './IContainer';
export type { ContainerOptions, DuplicateBindingPolicy } from './options';
export type { AutowireFactory } from './AutowiringContainer';

export { AutowiringContainer } from './AutowiringContainer';
export { ContainerBuilder } from './ContainerBuilder';
export { Container } from './Container';
export { NamespaceContainer } from './NamespaceContainer';
export { InterfaceContainer } from './InterfaceContainer';
export { AttributeContainer } from './AttributeContainer';
