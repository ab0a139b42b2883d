export { ContextContainer, DEFAULT_CONTEXT } from './ContextContainer';
export type { ContextContainerOptions } from './ContextContainer';
export { ContextInjector } from './ContextInjector';
