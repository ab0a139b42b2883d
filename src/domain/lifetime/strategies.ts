/**
 * @fileoverview Singleton and transient lifetimes
 *
 * @module wirestack/domain/lifetime
 */

import { ServiceType } from '../../infrastructure/reflection';
import { ILifetimeStrategy, LifetimeStrategyFactory } from './ILifetimeStrategy';

/**
 * Calls the factory once and returns the stored instance afterwards.
 *
 * @remarks
 * A factory that throws stores nothing; the next call tries again.
 */
export class SingletonStrategy<T> implements ILifetimeStrategy<T> {
  private instance: { value: T } | null = null;

  constructor(public readonly type: ServiceType<T>) {}

  get(factory: () => T): T {
    if (this.instance === null) {
      this.instance = { value: factory() };
    }
    return this.instance.value;
  }
}

/**
 * Calls the factory on every request.
 */
export class TransientStrategy<T> implements ILifetimeStrategy<T> {
  constructor(public readonly type: ServiceType<T>) {}

  get(factory: () => T): T {
    return factory();
  }
}

export const singletonStrategyFactory: LifetimeStrategyFactory = (type) =>
  new SingletonStrategy(type);

export const transientStrategyFactory: LifetimeStrategyFactory = (type) =>
  new TransientStrategy(type);
