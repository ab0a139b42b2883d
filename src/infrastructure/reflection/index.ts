/**
 * @module wirestack/infrastructure/reflection
 * @description Parameter inspection, metadata storage and decorators
 */

export type {
  ServiceType,
  ContextName,
  ExplicitArguments,
  AnyFunction,
} from './types';
export {
  isServiceType,
  isInstanceOf,
  isSubclassOf,
  describeValue,
  describeContext,
} from './types';

export type { ParameterAnnotation } from './metadata';
export {
  METADATA_KEYS,
  annotateParameter,
  getParameterAnnotation,
  declareContext,
  getDeclaredContexts,
  registerNamespace,
  getNamespace,
  getTypeName,
  annotate,
  getAnnotations,
} from './metadata';

export type {
  ParameterDescriptor,
  CallableDescriptor,
  ParameterDeclaration,
  InjectOptions,
  InstanceTypes,
} from './parameters';
export { inject, describeConstructor, describeFunction } from './parameters';

export {
  Injectable,
  Inject,
  Named,
  Optional,
  Required,
  Context,
  Namespace,
  Annotate,
} from './decorators';
