/**
 * @fileoverview Namespace container
 *
 * @module wirestack/application/di
 */

import { IInjector } from '../injection';
import { ServiceType, getTypeName } from '../../infrastructure/reflection';
import { AutowireFactory, AutowiringContainer } from './AutowiringContainer';

/**
 * Answers every class registered in a namespace or one of its children.
 *
 * @remarks
 * A class is in namespace `billing` when its qualified name starts with
 * `billing.` (see `@Namespace()` / `registerNamespace()`). The empty
 * namespace is the root and matches every class.
 *
 * @example
 * ```typescript
 * @Namespace('billing.invoices')
 * class InvoiceRenderer {}
 *
 * const billing = new NamespaceContainer('billing');
 * billing.has(InvoiceRenderer); // true
 * ```
 */
export class NamespaceContainer extends AutowiringContainer {
  readonly namespace: string;

  constructor(namespace: string, injector?: IInjector, factory?: AutowireFactory) {
    super(injector, factory);
    this.namespace = namespace.replace(/^\.+|\.+$/g, '');
  }

  has(type: ServiceType): boolean {
    return this.namespace === '' || getTypeName(type).startsWith(`${this.namespace}.`);
  }
}
