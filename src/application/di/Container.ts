/**
 * @fileoverview Container
 *
 * @module wirestack/application/di
 */

import {
  DuplicateBindingError,
  InstanceTypeError,
  UnresolvedTypeError,
} from '../../domain/exceptions';
import { ILifetimeStrategy, LifetimeStrategyFactory } from '../../domain/lifetime';
import { ResolutionStack } from '../../domain/resolution';
import { getDefaultLogger } from '../../infrastructure/config';
import { ILogger } from '../../infrastructure/logging';
import {
  ServiceType,
  describeValue,
  getTypeName,
  isInstanceOf,
} from '../../infrastructure/reflection';
import { ContainerInjector, IInjector } from '../injection';
import { IInstanceProvider } from '../provision';
import { ContainerBuilder } from './ContainerBuilder';
import { IContainer } from './IContainer';
import { ContainerOptions, DuplicateBindingPolicy } from './options';

interface Binding<T> {
  lifetime: ILifetimeStrategy<T>;
  provider: IInstanceProvider<T>;
}

interface NestedContainer {
  container: IContainer;
  lifetimeFactory: LifetimeStrategyFactory;

  /** One strategy per type answered by `container` */
  strategies: Map<ServiceType, ILifetimeStrategy<unknown>>;
}

/**
 * Type-keyed dependency injection container.
 *
 * @remarks
 * Bindings take precedence over nested containers; nested containers are
 * consulted in the order they were added. A type being resolved by this
 * container cannot be requested from it again until that resolution ends.
 *
 * @example
 * ```typescript
 * const container = new Container().build((c) => {
 *   c.addSingletonInstance(Config, new Config({ dsn: 'memory://' }));
 *   c.addSingletonClass(Database);
 *   c.addTransientClass(UserService);
 * });
 *
 * const users = container.get(UserService);
 * ```
 */
export class Container extends ContainerBuilder {
  private readonly bindings = new Map<ServiceType, Binding<unknown>>();
  private readonly nested: NestedContainer[] = [];
  private readonly frames = new ResolutionStack();
  private readonly injector: IInjector;
  private readonly logger: ILogger;
  private readonly duplicateBindings: DuplicateBindingPolicy;

  constructor(options: ContainerOptions = {}) {
    super();
    this.injector = options.injector ?? new ContainerInjector(this);
    this.logger = options.logger ?? getDefaultLogger();
    this.duplicateBindings = options.duplicateBindings ?? 'replace';
  }

  // ==========================================================================
  // IContainer
  // ==========================================================================

  has(type: ServiceType): boolean {
    return this.bindings.has(type) || this.nested.some(({ container }) => container.has(type));
  }

  get<T>(type: ServiceType<T>): T {
    this.frames.enter(type);
    try {
      const value = this.provide(type);
      if (!isInstanceOf(value, type)) {
        throw new InstanceTypeError(type, describeValue(value));
      }
      return value;
    } finally {
      this.frames.leave(type);
    }
  }

  // ==========================================================================
  // IContainerBuilder
  // ==========================================================================

  /**
   * @throws {DuplicateBindingError} If `type` is bound and duplicates are rejected
   */
  add<T>(type: ServiceType<T>, lifetime: ILifetimeStrategy<T>, provider: IInstanceProvider<T>): this {
    if (this.bindings.has(type)) {
      if (this.duplicateBindings === 'reject') {
        throw new DuplicateBindingError(type);
      }
      this.logger.debug(`[Container] Replacing binding for ${getTypeName(type)}`);
    }
    this.bindings.set(type, { lifetime, provider });
    return this;
  }

  addContainer(container: IContainer, lifetimeFactory: LifetimeStrategyFactory): this {
    this.nested.push({ container, lifetimeFactory, strategies: new Map() });
    return this;
  }

  // ==========================================================================
  // Management
  // ==========================================================================

  /**
   * Remove the binding for `type`. Nested containers are not affected.
   *
   * @returns Whether a binding was removed
   */
  remove(type: ServiceType): boolean {
    return this.bindings.delete(type);
  }

  /**
   * Run `callback` against this container and return it.
   */
  build(callback: (container: this) => void): this {
    callback(this);
    return this;
  }

  getInjector(): IInjector {
    return this.injector;
  }

  private provide(type: ServiceType): unknown {
    const binding = this.bindings.get(type);
    if (binding) {
      return binding.lifetime.get(() => binding.provider.get());
    }

    const entry = this.nested.find(({ container }) => container.has(type));
    if (entry) {
      this.logger.debug(`[Container] ${getTypeName(type)} supplied by ${entry.container.constructor.name}`);
      return this.strategyFor(entry, type).get(() => entry.container.get(type));
    }

    throw new UnresolvedTypeError(type);
  }

  private strategyFor(entry: NestedContainer, type: ServiceType): ILifetimeStrategy<unknown> {
    let strategy = entry.strategies.get(type);
    if (!strategy) {
      strategy = entry.lifetimeFactory(type);
      entry.strategies.set(type, strategy);
    }
    return strategy;
  }
}
