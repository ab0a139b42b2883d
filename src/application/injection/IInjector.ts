/**
 * @fileoverview Injector contracts
 *
 * @packageDocumentation
 * @module wirestack/application/injection
 *
 * An injector invokes functions and constructors, supplying each parameter
 * from, in order:
 *
 * 1. explicit arguments, by parameter name then by position
 * 2. its {@link IParameterResolver}
 * 3. the parameter's JavaScript default value
 * 4. `null`, when the parameter is optional
 *
 * A parameter that none of these can supply fails the call with an
 * `UnresolvedParameterError`.
 */

import {
  AnyFunction,
  CallableDescriptor,
  ExplicitArguments,
  ParameterDescriptor,
  ServiceType,
} from '../../infrastructure/reflection';

/**
 * Invokes callables with injected parameters.
 */
export interface IInjector {
  /**
   * Call a function, supplying its parameters.
   *
   * @example
   * ```typescript
   * const send = inject([Mailer], (mailer: Mailer, to: string) => mailer.send(to));
   * injector.call(send, { 1: 'ops@example.test' });
   * ```
   */
  call<R>(fn: AnyFunction<R>, args?: ExplicitArguments): R;

  /**
   * Construct a class, supplying its constructor parameters.
   */
  instantiate<T>(type: ServiceType<T>, args?: ExplicitArguments): T;
}

/**
 * Anything that hands out the injector used to autowire its bindings.
 */
export interface InjectorProvider {
  getInjector(): IInjector;
}

/**
 * Outcome of asking a resolver for a parameter.
 *
 * @remarks
 * `null` and `undefined` are valid resolved values, so "no value" is
 * modelled separately.
 */
export type ParameterResolution =
  | { resolved: true; value: unknown }
  | { resolved: false };

/**
 * Supplies parameter values that were not given explicitly.
 */
export interface IParameterResolver {
  resolve(parameter: ParameterDescriptor, callable: CallableDescriptor): ParameterResolution;
}

export const UNRESOLVED: ParameterResolution = { resolved: false };
