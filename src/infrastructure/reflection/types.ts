/**
 * @fileoverview Core type aliases shared by the reflection layer and the containers.
 *
 * @packageDocumentation
 * @module wirestack/infrastructure/reflection
 */

/**
 * Identity of a requested service: any class, concrete or abstract.
 *
 * @remarks
 * TypeScript interfaces do not exist at runtime, so abstractions are modelled
 * as abstract classes. `instanceof` checks against the key are what make the
 * instance-type guarantees of the containers possible.
 *
 * @example
 * ```typescript
 * abstract class Clock {
 *   abstract now(): Date;
 * }
 *
 * class SystemClock extends Clock {
 *   now() { return new Date(); }
 * }
 *
 * container.addSingletonImplementation(Clock, SystemClock);
 * ```
 */
export type ServiceType<T = unknown> = abstract new (...args: any[]) => T;

/**
 * Name of a context in a {@link ContextContainer}.
 */
export type ContextName = string | symbol;

/**
 * Explicit argument values keyed by parameter name or position.
 *
 * @example
 * ```typescript
 * injector.call(sendMail, { to: 'ops@example.test', 1: 'subject' });
 * ```
 */
export type ExplicitArguments = Readonly<Record<string | number, unknown>>;

/**
 * Any function; parameters are supplied at runtime by the injector.
 */
export type AnyFunction<R = unknown> = (...args: never[]) => R;

/**
 * Wrapper constructors emitted by TypeScript for primitives and structural types.
 * They never identify a service and are treated as untyped parameters.
 */
const STRUCTURAL_TYPES: ReadonlySet<unknown> = new Set<unknown>([
  Object,
  String,
  Number,
  Boolean,
  Symbol,
  BigInt,
  Array,
  Function,
  Promise,
]);

/**
 * Check whether a value can be used as a {@link ServiceType}.
 */
export function isServiceType(value: unknown): value is ServiceType {
  return typeof value === 'function' && !STRUCTURAL_TYPES.has(value);
}

/**
 * Type guard backed by `instanceof`.
 */
export function isInstanceOf<T>(value: unknown, type: ServiceType<T>): value is T {
  return value instanceof type;
}

/**
 * Check whether `type` is a strict subclass of `base` (`type !== base`).
 */
export function isSubclassOf(type: ServiceType, base: ServiceType): boolean {
  return type !== base && type.prototype instanceof base;
}

/**
 * Describe any value for error messages.
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'object') {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
  }
  if (typeof value === 'function') {
    return value.name ? `function ${value.name}` : 'function';
  }
  return typeof value;
}

/**
 * Describe a context name for messages and logs.
 */
export function describeContext(name: ContextName): string {
  return typeof name === 'symbol' ? name.description ?? name.toString() : name;
}
