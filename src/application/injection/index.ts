export type {
  IInjector,
  InjectorProvider,
  IParameterResolver,
  ParameterResolution,
} from './IInjector';
export { UNRESOLVED } from './IInjector';
export { Injector } from './Injector';
export { ContainerInjector, ContainerParameterResolver } from './ContainerInjector';
