/**
 * @fileoverview Instance provider contract
 *
 * @packageDocumentation
 * @module wirestack/application/provision
 *
 * Providers produce the instance for one binding. They are wrapped by a
 * lifetime strategy, which decides how often `get()` is called:
 *
 * ```
 * container.get(T)
 *   └─ lifetime.get(() => provider.get())
 * ```
 *
 * | Provider | Produces |
 * |----------|----------|
 * | {@link InstanceValueProvider} | a fixed value |
 * | {@link FactoryInstanceProvider} | the result of an autowired factory call |
 * | {@link ClassInstanceProvider} | an autowired instance, optionally mutated |
 * | {@link ImplementationInstanceProvider} | whatever the container holds for a subclass |
 */

import { AnyFunction } from '../../infrastructure/reflection';

/**
 * Produces instances of `T` for a binding.
 */
export interface IInstanceProvider<T> {
  get(): T;
}

/**
 * A function that builds an instance; its parameters are autowired.
 */
export type Factory<T> = AnyFunction<T>;

/**
 * Called after construction with the new instance as its first argument.
 * Any further parameters are autowired.
 */
export type Mutator<T> = (instance: T, ...args: never[]) => unknown;
