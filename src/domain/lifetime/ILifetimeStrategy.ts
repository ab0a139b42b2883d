/**
 * @fileoverview Lifetime strategy contract
 *
 * @packageDocumentation
 * @module wirestack/domain/lifetime
 *
 * A lifetime strategy decides whether a binding's provider runs on every
 * request or only once. Strategies never produce values themselves: they
 * receive a factory and decide whether to call it.
 *
 * ```
 * Singleton:  get(f) → f() → instance-1
 *             get(f) →       instance-1   (f not called)
 *
 * Transient:  get(f) → f() → instance-1
 *             get(f) → f() → instance-2
 * ```
 */

import { ServiceType } from '../../infrastructure/reflection';

/**
 * Caching policy applied to one binding.
 *
 * @template T - Instance type of the binding
 */
export interface ILifetimeStrategy<T> {
  /**
   * The type this strategy was created for.
   */
  readonly type: ServiceType<T>;

  /**
   * Return an instance, calling `factory` when the policy requires a new one.
   */
  get(factory: () => T): T;
}

/**
 * Creates a fresh strategy for a type.
 *
 * @remarks
 * Nested containers are registered with a factory instead of a strategy
 * because the types they will be asked for are not known in advance. The
 * owning container creates one strategy per type on first request.
 */
export type LifetimeStrategyFactory = <T>(type: ServiceType<T>) => ILifetimeStrategy<T>;
