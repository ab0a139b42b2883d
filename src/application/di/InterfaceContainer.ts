/**
 * @fileoverview Interface container
 *
 * @module wirestack/application/di
 */

import { IInjector } from '../injection';
import { ServiceType, isSubclassOf } from '../../infrastructure/reflection';
import { AutowireFactory, AutowiringContainer } from './AutowiringContainer';

/**
 * Answers every strict subclass of a base class.
 *
 * @remarks
 * The base class itself is not matched: asking for it would not say which
 * implementation to build.
 *
 * @example
 * ```typescript
 * abstract class Handler {}
 * class CreateUserHandler extends Handler {}
 *
 * container.addTransientInterface(Handler);
 * container.get(CreateUserHandler);
 * ```
 */
export class InterfaceContainer extends AutowiringContainer {
  constructor(
    readonly base: ServiceType,
    injector?: IInjector,
    factory?: AutowireFactory
  ) {
    super(injector, factory);
  }

  has(type: ServiceType): boolean {
    return isSubclassOf(type, this.base);
  }
}
