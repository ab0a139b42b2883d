/**
 * @fileoverview Predicate containers
 *
 * @module wirestack/application/di
 */

import {
  InstanceTypeError,
  UnresolvedTypeError,
} from '../../domain/exceptions';
import { ResolutionStack } from '../../domain/resolution';
import {
  ExplicitArguments,
  ServiceType,
  describeValue,
  isInstanceOf,
} from '../../infrastructure/reflection';
import { ContainerInjector, IInjector, InjectorProvider } from '../injection';
import { IContainer } from './IContainer';

/**
 * Builds an instance of a matched type.
 *
 * @remarks
 * Receives the requested class as explicit argument 0. Attribute containers
 * pass the matching attribute as argument 1. Remaining parameters are
 * autowired.
 */
export type AutowireFactory = (type: ServiceType, ...args: never[]) => unknown;

/**
 * Base of containers that answer every type matching a predicate, with no
 * per-type registration.
 *
 * @remarks
 * A matched type is constructed through the injector, or handed to the
 * factory when one is given. Without an explicit injector, parameters are
 * autowired from the container itself. Nothing is cached here; wrap the
 * container with a lifetime through `addContainer()`.
 */
export abstract class AutowiringContainer implements IContainer, InjectorProvider {
  private readonly frames = new ResolutionStack();
  private readonly injector: IInjector;

  constructor(
    injector?: IInjector,
    private readonly factory?: AutowireFactory
  ) {
    this.injector = injector ?? new ContainerInjector(this);
  }

  abstract has(type: ServiceType): boolean;

  get<T>(type: ServiceType<T>): T {
    if (!this.has(type)) {
      throw new UnresolvedTypeError(type);
    }

    this.frames.enter(type);
    try {
      const value: unknown = this.factory
        ? this.injector.call(this.factory, this.factoryArguments(type))
        : this.injector.instantiate(type);

      if (!isInstanceOf(value, type)) {
        throw new InstanceTypeError(type, describeValue(value));
      }
      return value;
    } finally {
      this.frames.leave(type);
    }
  }

  getInjector(): IInjector {
    return this.injector;
  }

  /**
   * Explicit arguments passed to the factory for `type`.
   */
  protected factoryArguments(type: ServiceType): ExplicitArguments {
    return { 0: type };
  }
}
