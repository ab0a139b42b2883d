/**
 * @fileoverview Container-backed injection
 *
 * @module wirestack/application/injection
 */

import { ParameterDescriptor } from '../../infrastructure/reflection';
import type { IContainer } from '../di/IContainer';
import { IParameterResolver, ParameterResolution, UNRESOLVED } from './IInjector';
import { Injector } from './Injector';

/**
 * Resolves a parameter's declared type from a container.
 *
 * @remarks
 * Untyped parameters, and types the container does not have, are left
 * unresolved so that defaults and optional parameters can apply.
 */
export class ContainerParameterResolver implements IParameterResolver {
  constructor(private readonly container: IContainer) {}

  resolve(parameter: ParameterDescriptor): ParameterResolution {
    const type = parameter.type;
    if (type === undefined || !this.container.has(type)) {
      return UNRESOLVED;
    }
    return { resolved: true, value: this.container.get(type) };
  }
}

/**
 * Injector that autowires parameters from a container.
 *
 * @example
 * ```typescript
 * const injector = new ContainerInjector(container);
 * const report = injector.call(
 *   inject([ReportService], (service: ReportService) => service.daily())
 * );
 * ```
 */
export class ContainerInjector extends Injector {
  constructor(container: IContainer) {
    super(new ContainerParameterResolver(container));
  }
}
