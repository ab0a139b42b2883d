/**
 * @fileoverview Builder convenience methods
 *
 * @module wirestack/application/di
 *
 * Shorthands over `add()` and `addContainer()`. Each returns the container:
 *
 * ```typescript
 * container
 *   .addSingletonInstance(Config, config)
 *   .addSingletonImplementation(Clock, SystemClock)
 *   .addSingletonClass(SystemClock)
 *   .addTransientFactory(Session, inject([Clock], (clock: Clock) => new Session(clock.now())))
 *   .addTransientInterface(Handler);
 * ```
 *
 * Namespace, interface and attribute containers created here autowire
 * through this container's injector, so their classes can depend on
 * anything bound in this container.
 */

import {
  ILifetimeStrategy,
  LifetimeStrategyFactory,
  SingletonStrategy,
  singletonStrategyFactory,
  transientStrategyFactory,
} from '../../domain/lifetime';
import { ServiceType } from '../../infrastructure/reflection';
import { IInjector, InjectorProvider } from '../injection';
import {
  ClassInstanceProvider,
  Factory,
  FactoryInstanceProvider,
  IInstanceProvider,
  ImplementationInstanceProvider,
  InstanceValueProvider,
  Mutator,
} from '../provision';
import { AttributeContainer } from './AttributeContainer';
import { AutowireFactory } from './AutowiringContainer';
import { IContainer, IContainerBuilder } from './IContainer';
import { InterfaceContainer } from './InterfaceContainer';
import { NamespaceContainer } from './NamespaceContainer';

export abstract class ContainerBuilder implements IContainer, IContainerBuilder, InjectorProvider {
  abstract has(type: ServiceType): boolean;

  abstract get<T>(type: ServiceType<T>): T;

  abstract add<T>(
    type: ServiceType<T>,
    lifetime: ILifetimeStrategy<T>,
    provider: IInstanceProvider<T>
  ): this;

  abstract addContainer(container: IContainer, lifetimeFactory: LifetimeStrategyFactory): this;

  abstract getInjector(): IInjector;

  // ==========================================================================
  // Singleton
  // ==========================================================================

  /**
   * Construct `type` once, autowiring its constructor.
   */
  addSingletonClass<T>(type: ServiceType<T>, mutator?: Mutator<T>): this {
    return this.addClass(singletonStrategyFactory, type, mutator);
  }

  /**
   * Resolve `type` as `implementation`, once.
   *
   * @throws {ImplementationError} If `implementation` is not a strict subclass of `type`
   */
  addSingletonImplementation<T>(type: ServiceType<T>, implementation: ServiceType<T>): this {
    return this.addImplementation(singletonStrategyFactory, type, implementation);
  }

  addSingletonFactory<T>(type: ServiceType<T>, factory: Factory<T>): this {
    return this.addFactory(singletonStrategyFactory, type, factory);
  }

  /**
   * Bind `type` to an existing instance.
   */
  addSingletonInstance<T>(type: ServiceType<T>, instance: T): this {
    return this.add(type, new SingletonStrategy(type), new InstanceValueProvider(type, instance));
  }

  /**
   * Consult `container`, keeping one instance per type it answers.
   */
  addSingletonContainer(container: IContainer): this {
    return this.addContainer(container, singletonStrategyFactory);
  }

  addSingletonNamespace(namespace: string, factory?: AutowireFactory): this {
    return this.addSingletonContainer(new NamespaceContainer(namespace, this.getInjector(), factory));
  }

  addSingletonInterface(base: ServiceType, factory?: AutowireFactory): this {
    return this.addSingletonContainer(new InterfaceContainer(base, this.getInjector(), factory));
  }

  addSingletonAttribute<A>(attribute: ServiceType<A>, factory?: AutowireFactory): this {
    return this.addSingletonContainer(new AttributeContainer(attribute, this.getInjector(), factory));
  }

  // ==========================================================================
  // Transient
  // ==========================================================================

  /**
   * Construct a new `type` on every request.
   */
  addTransientClass<T>(type: ServiceType<T>, mutator?: Mutator<T>): this {
    return this.addClass(transientStrategyFactory, type, mutator);
  }

  addTransientImplementation<T>(type: ServiceType<T>, implementation: ServiceType<T>): this {
    return this.addImplementation(transientStrategyFactory, type, implementation);
  }

  addTransientFactory<T>(type: ServiceType<T>, factory: Factory<T>): this {
    return this.addFactory(transientStrategyFactory, type, factory);
  }

  addTransientContainer(container: IContainer): this {
    return this.addContainer(container, transientStrategyFactory);
  }

  addTransientNamespace(namespace: string, factory?: AutowireFactory): this {
    return this.addTransientContainer(new NamespaceContainer(namespace, this.getInjector(), factory));
  }

  addTransientInterface(base: ServiceType, factory?: AutowireFactory): this {
    return this.addTransientContainer(new InterfaceContainer(base, this.getInjector(), factory));
  }

  addTransientAttribute<A>(attribute: ServiceType<A>, factory?: AutowireFactory): this {
    return this.addTransientContainer(new AttributeContainer(attribute, this.getInjector(), factory));
  }

  // ==========================================================================
  // Shared
  // ==========================================================================

  private addClass<T>(
    lifetime: LifetimeStrategyFactory,
    type: ServiceType<T>,
    mutator: Mutator<T> | undefined
  ): this {
    return this.add(type, lifetime(type), new ClassInstanceProvider(type, mutator, this.getInjector()));
  }

  private addImplementation<T>(
    lifetime: LifetimeStrategyFactory,
    type: ServiceType<T>,
    implementation: ServiceType<T>
  ): this {
    return this.add(type, lifetime(type), new ImplementationInstanceProvider(type, implementation, this));
  }

  private addFactory<T>(
    lifetime: LifetimeStrategyFactory,
    type: ServiceType<T>,
    factory: Factory<T>
  ): this {
    return this.add(type, lifetime(type), new FactoryInstanceProvider(type, factory, this.getInjector()));
  }
}
