/**
 * @fileoverview Container options
 *
 * @module wirestack/application/di
 */

import { ILogger } from '../../infrastructure/logging';
import { IInjector } from '../injection';

/**
 * What `add()` does when the type is already bound.
 *
 * - `replace`: the new binding wins
 * - `reject`: throw `DuplicateBindingError`
 */
export type DuplicateBindingPolicy = 'replace' | 'reject';

export interface ContainerOptions {
  /**
   * Defaults to a console logger at the `DI_LOG_LEVEL` level.
   */
  logger?: ILogger;

  /**
   * @default 'replace'
   */
  duplicateBindings?: DuplicateBindingPolicy;

  /**
   * Injector used to autowire this container's bindings.
   * Defaults to a `ContainerInjector` over the container itself.
   */
  injector?: IInjector;
}
