export {
  DependencyInjectionError,
  UnresolvedDependencyError,
  UnresolvedTypeError,
  UnresolvedParameterError,
  CircularDependencyError,
  ImplementationError,
  InstanceTypeError,
  DuplicateBindingError,
  UnknownContextError,
  ContextStackError,
  ResolutionFrameError,
} from './exceptions';
