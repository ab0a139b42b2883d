/**
 * @fileoverview Instance providers
 *
 * @module wirestack/application/provision
 */

import { ImplementationError, InstanceTypeError } from '../../domain/exceptions';
import {
  ServiceType,
  describeValue,
  isInstanceOf,
  isSubclassOf,
} from '../../infrastructure/reflection';
import type { IContainer } from '../di/IContainer';
import { IInjector } from '../injection';
import { Factory, IInstanceProvider, Mutator } from './IInstanceProvider';

/**
 * Narrow a produced value to `T` or fail.
 */
function checkInstance<T>(type: ServiceType<T>, value: unknown): T {
  if (!isInstanceOf(value, type)) {
    throw new InstanceTypeError(type, describeValue(value));
  }
  return value;
}

/**
 * Returns a value supplied at registration.
 *
 * @example
 * ```typescript
 * container.addSingletonInstance(Config, new Config({ region: 'eu' }));
 * ```
 */
export class InstanceValueProvider<T> implements IInstanceProvider<T> {
  constructor(
    private readonly type: ServiceType<T>,
    private readonly value: T
  ) {}

  get(): T {
    return checkInstance(this.type, this.value);
  }
}

/**
 * Calls a factory through the injector.
 *
 * @remarks
 * The result must be an instance of the bound type or one of its
 * subclasses; `null`, `undefined` and foreign values fail with
 * `InstanceTypeError`.
 */
export class FactoryInstanceProvider<T> implements IInstanceProvider<T> {
  constructor(
    private readonly type: ServiceType<T>,
    private readonly factory: Factory<T>,
    private readonly injector: IInjector
  ) {}

  get(): T {
    const value: unknown = this.injector.call(this.factory);
    return checkInstance(this.type, value);
  }
}

/**
 * Constructs the bound class through the injector.
 *
 * @remarks
 * The optional mutator runs after construction. It receives the instance as
 * explicit argument 0; its other parameters are autowired.
 *
 * @example
 * ```typescript
 * container.addSingletonClass(
 *   HttpClient,
 *   inject([HttpClient, Config], (client: HttpClient, config: Config) => {
 *     client.baseUrl = config.apiUrl;
 *   })
 * );
 * ```
 */
export class ClassInstanceProvider<T> implements IInstanceProvider<T> {
  constructor(
    private readonly type: ServiceType<T>,
    private readonly mutator: Mutator<T> | undefined,
    private readonly injector: IInjector
  ) {}

  get(): T {
    const instance = this.injector.instantiate(this.type);
    if (this.mutator) {
      this.injector.call(this.mutator, { 0: instance });
    }
    return instance;
  }
}

/**
 * Resolves the bound type as one of its subclasses.
 *
 * @throws {ImplementationError} At construction, when `implementation` is
 *   not a strict subclass of `type`
 */
export class ImplementationInstanceProvider<T> implements IInstanceProvider<T> {
  constructor(
    private readonly type: ServiceType<T>,
    private readonly implementation: ServiceType<T>,
    private readonly container: IContainer
  ) {
    if (!isSubclassOf(implementation, type)) {
      throw new ImplementationError(type, implementation);
    }
  }

  get(): T {
    return checkInstance(this.type, this.container.get(this.implementation));
  }
}
