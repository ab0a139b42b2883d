/**
 * @fileoverview Injector
 *
 * @module wirestack/application/injection
 */

import { CircularDependencyError, InstanceTypeError, UnresolvedParameterError } from '../../domain/exceptions';
import {
  AnyFunction,
  CallableDescriptor,
  ExplicitArguments,
  ParameterDescriptor,
  ServiceType,
  describeConstructor,
  describeFunction,
  describeValue,
  isInstanceOf,
} from '../../infrastructure/reflection';
import { IInjector, IParameterResolver, ParameterResolution } from './IInjector';

/**
 * Supplies parameters from explicit arguments and a {@link IParameterResolver}.
 *
 * @remarks
 * Errors thrown by the resolver are wrapped in an `UnresolvedParameterError`
 * naming the callable and parameter. A `CircularDependencyError` is rethrown
 * as is so that it reaches the caller of the outermost `get()` unchanged.
 *
 * Subclasses customise how a single parameter is resolved by overriding
 * {@link resolveFromContainer}.
 */
export class Injector implements IInjector {
  constructor(protected readonly resolver: IParameterResolver) {}

  call<R>(fn: AnyFunction<R>, args: ExplicitArguments = {}): R {
    const callable = describeFunction(fn);
    return Reflect.apply(fn, undefined, this.resolveArguments(callable, args));
  }

  instantiate<T>(type: ServiceType<T>, args: ExplicitArguments = {}): T {
    const callable = describeConstructor(type);
    const instance: unknown = Reflect.construct(type, this.resolveArguments(callable, args));

    // A constructor may return a different object
    if (!isInstanceOf(instance, type)) {
      throw new InstanceTypeError(type, describeValue(instance));
    }
    return instance;
  }

  protected resolveArguments(callable: CallableDescriptor, args: ExplicitArguments): unknown[] {
    return callable.parameters.map((parameter) => this.resolveParameter(callable, parameter, args));
  }

  protected resolveParameter(
    callable: CallableDescriptor,
    parameter: ParameterDescriptor,
    args: ExplicitArguments
  ): unknown {
    if (parameter.name !== undefined && Object.hasOwn(args, parameter.name)) {
      return args[parameter.name];
    }
    if (Object.hasOwn(args, parameter.index)) {
      return args[parameter.index];
    }

    let resolution: ParameterResolution;
    try {
      resolution = this.resolveFromContainer(parameter, callable);
    } catch (error) {
      if (error instanceof CircularDependencyError) {
        throw error;
      }
      throw this.unresolved(callable, parameter, error);
    }

    if (resolution.resolved) {
      return resolution.value;
    }
    if (parameter.hasDefault) {
      // undefined lets the JavaScript default apply
      return undefined;
    }
    if (parameter.nullable) {
      return null;
    }
    throw this.unresolved(callable, parameter);
  }

  protected resolveFromContainer(
    parameter: ParameterDescriptor,
    callable: CallableDescriptor
  ): ParameterResolution {
    return this.resolver.resolve(parameter, callable);
  }

  private unresolved(
    callable: CallableDescriptor,
    parameter: ParameterDescriptor,
    previous?: unknown
  ): UnresolvedParameterError {
    return new UnresolvedParameterError(
      callable.name,
      parameter.index,
      parameter.name,
      parameter.type,
      previous
    );
  }
}
