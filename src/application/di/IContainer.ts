/**
 * @fileoverview Container contracts
 *
 * @packageDocumentation
 * @module wirestack/application/di
 *
 * ## Resolution
 *
 * ```
 * container.get(UserService)
 *   ├─ local binding?       → lifetime.get(() => provider.get())
 *   ├─ nested containers    → first with has(UserService) answers,
 *   │   (registration order)  wrapped in that entry's lifetime
 *   └─ nothing              → UnresolvedTypeError
 * ```
 *
 * Every value returned by `get()` is checked with `instanceof` against the
 * requested type.
 */

import { ILifetimeStrategy, LifetimeStrategyFactory } from '../../domain/lifetime';
import { ServiceType } from '../../infrastructure/reflection';
import { IInstanceProvider } from '../provision';

/**
 * Read side of a container.
 */
export interface IContainer {
  /**
   * Whether `get(type)` can be answered. Never constructs anything.
   */
  has(type: ServiceType): boolean;

  /**
   * Resolve an instance of `type`.
   *
   * @throws {UnresolvedTypeError} If nothing can supply `type`
   * @throws {CircularDependencyError} If `type` is already being resolved
   * @throws {InstanceTypeError} If the supplied value is not a `type`
   */
  get<T>(type: ServiceType<T>): T;
}

/**
 * Write side of a container.
 */
export interface IContainerBuilder {
  /**
   * Bind `type` to a provider under a lifetime.
   */
  add<T>(type: ServiceType<T>, lifetime: ILifetimeStrategy<T>, provider: IInstanceProvider<T>): this;

  /**
   * Consult `container` for types with no local binding.
   *
   * @remarks
   * `lifetimeFactory` creates one strategy per type resolved through
   * `container`.
   */
  addContainer(container: IContainer, lifetimeFactory: LifetimeStrategyFactory): this;
}
