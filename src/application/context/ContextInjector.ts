/**
 * @fileoverview Context-aware injection
 *
 * @module wirestack/application/context
 */

import { DependencyInjectionError } from '../../domain/exceptions';
import {
  CallableDescriptor,
  ContextName,
  ParameterDescriptor,
} from '../../infrastructure/reflection';
import { ContainerParameterResolver, Injector, ParameterResolution } from '../injection';
import type { ContextContainer } from './ContextContainer';

/**
 * Injector that applies `@Context()` declarations while resolving each
 * parameter.
 *
 * @remarks
 * For every parameter it pushes, in order, the contexts of the declaring
 * class, of the function, and of the parameter itself. The same number of
 * contexts is popped once the parameter is resolved, whether or not
 * resolution succeeded.
 */
export class ContextInjector extends Injector {
  constructor(private readonly container: ContextContainer) {
    super(new ContainerParameterResolver(container));
  }

  protected override resolveFromContainer(
    parameter: ParameterDescriptor,
    callable: CallableDescriptor
  ): ParameterResolution {
    const pushed = this.enterContexts(
      [...callable.ownerContexts, ...callable.contexts, ...parameter.contexts],
      parameter
    );
    try {
      return super.resolveFromContainer(parameter, callable);
    } finally {
      this.leaveContexts(pushed);
    }
  }

  private enterContexts(names: readonly ContextName[], parameter: ParameterDescriptor): number {
    let pushed = 0;
    try {
      for (const name of names) {
        this.container.push(name);
        pushed++;
      }
    } catch (error) {
      this.leaveContexts(pushed);
      throw new DependencyInjectionError(
        `Error applying context for parameter #${parameter.index}`,
        error
      );
    }
    return pushed;
  }

  private leaveContexts(count: number): void {
    for (let remaining = count; remaining > 0; remaining--) {
      this.container.pop();
    }
  }
}
