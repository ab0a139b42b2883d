/**
 * @fileoverview Metadata storage
 *
 * Decorators and explicit registration functions write here; the parameter
 * inspection and the specialized containers read from here. How the metadata
 * gets defined has no effect on resolution.
 *
 * Everything is stored with `Reflect.defineMetadata` under the keys of
 * {@link METADATA_KEYS} and read back as own metadata only, so a subclass
 * never picks up its parent's declarations by accident.
 *
 * @module wirestack/infrastructure/reflection
 */

import 'reflect-metadata';

import { ContextName, ServiceType } from './types';

/**
 * Per-parameter annotations collected from parameter decorators.
 */
export interface ParameterAnnotation {
  /** Type to resolve instead of the emitted `design:paramtypes` entry */
  type?: ServiceType;

  /** Name used to look up explicit arguments */
  name?: string;

  /** Accept `null` when nothing else supplies a value */
  optional?: boolean;

  /** The parameter has no default value, whatever `Function.length` says */
  required?: boolean;

  /** Contexts pushed while this parameter is resolved */
  contexts?: ContextName[];
}

// ============================================================================
// Keys
// ============================================================================

export const METADATA_KEYS = {
  parameters: 'wirestack:parameters',
  contexts: 'wirestack:contexts',
  namespace: 'wirestack:namespace',
  annotations: 'wirestack:annotations',
  function: 'wirestack:function',
} as const;

/**
 * Own metadata of `target` under `key`, or `fallback` when none is defined.
 */
export function readOwnMetadata<T>(key: string, target: object, fallback: T): T {
  const stored: T | undefined = Reflect.getOwnMetadata(key, target);
  return stored ?? fallback;
}

// ============================================================================
// Parameters
// ============================================================================

/**
 * Merge an annotation into the parameter at `index` of `target`.
 */
export function annotateParameter(
  target: object,
  index: number,
  annotation: ParameterAnnotation
): void {
  const annotations = [
    ...readOwnMetadata<(ParameterAnnotation | undefined)[]>(METADATA_KEYS.parameters, target, []),
  ];
  const previous = annotations[index] ?? {};

  annotations[index] = {
    ...previous,
    ...annotation,
    contexts: [...(previous.contexts ?? []), ...(annotation.contexts ?? [])],
  };
  Reflect.defineMetadata(METADATA_KEYS.parameters, annotations, target);
}

/**
 * Annotations recorded for the parameter at `index` of `target`.
 */
export function getParameterAnnotation(target: object, index: number): ParameterAnnotation {
  return readOwnMetadata<(ParameterAnnotation | undefined)[]>(METADATA_KEYS.parameters, target, [])[index] ?? {};
}

// ============================================================================
// Contexts
// ============================================================================

/**
 * Declare contexts that apply to every parameter of a class constructor
 * or of a function.
 *
 * @example
 * ```typescript
 * declareContext(ReportJob, 'reporting');
 * ```
 */
export function declareContext(target: object, ...names: ContextName[]): void {
  Reflect.defineMetadata(
    METADATA_KEYS.contexts,
    [...getDeclaredContexts(target), ...names],
    target
  );
}

/**
 * Contexts declared on a class or function.
 */
export function getDeclaredContexts(target: object): readonly ContextName[] {
  return readOwnMetadata<ContextName[]>(METADATA_KEYS.contexts, target, []);
}

// ============================================================================
// Namespaces
// ============================================================================

/**
 * Register the namespace a class belongs to.
 *
 * @remarks
 * Namespaces are dot-separated (`billing.invoices`). A class without a
 * namespace lives in the root namespace.
 */
export function registerNamespace(type: object, namespace: string): void {
  Reflect.defineMetadata(METADATA_KEYS.namespace, namespace, type);
}

/**
 * The namespace registered for a class, or `''` for the root namespace.
 */
export function getNamespace(type: ServiceType): string {
  return readOwnMetadata(METADATA_KEYS.namespace, type, '');
}

/**
 * Fully-qualified display name of a class (`namespace.ClassName`).
 */
export function getTypeName(type: ServiceType): string {
  const namespace = getNamespace(type);
  const name = type.name || '(anonymous)';
  return namespace ? `${namespace}.${name}` : name;
}

// ============================================================================
// Annotations
// ============================================================================

/**
 * Attach attribute instances to a class.
 *
 * @example
 * ```typescript
 * class Route {
 *   constructor(readonly path: string) {}
 * }
 *
 * annotate(UsersController, new Route('/users'));
 * ```
 */
export function annotate(type: object, ...attributes: object[]): void {
  Reflect.defineMetadata(
    METADATA_KEYS.annotations,
    [...readOwnMetadata<object[]>(METADATA_KEYS.annotations, type, []), ...attributes],
    type
  );
}

/**
 * Attribute instances attached to a class, optionally filtered by attribute class.
 */
export function getAnnotations<A>(type: ServiceType, attribute: ServiceType<A>): A[];
export function getAnnotations(type: ServiceType): object[];
export function getAnnotations(type: ServiceType, attribute?: ServiceType): unknown[] {
  const attached = readOwnMetadata<object[]>(METADATA_KEYS.annotations, type, []);
  return attribute ? attached.filter((item) => item instanceof attribute) : [...attached];
}
