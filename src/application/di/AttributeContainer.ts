/**
 * @fileoverview Attribute container
 *
 * @module wirestack/application/di
 */

import { IInjector } from '../injection';
import {
  ExplicitArguments,
  ServiceType,
  getAnnotations,
} from '../../infrastructure/reflection';
import { AutowireFactory, AutowiringContainer } from './AutowiringContainer';

/**
 * Answers every class annotated with an instance of an attribute class.
 *
 * @remarks
 * The factory receives the class as argument 0 and its first matching
 * attribute as argument 1.
 *
 * @example
 * ```typescript
 * class Table {
 *   constructor(readonly name: string) {}
 * }
 *
 * @Annotate(new Table('users'))
 * class UserTable {
 *   constructor(readonly name: string) {}
 * }
 *
 * const tables = new AttributeContainer(
 *   Table,
 *   undefined,
 *   (type: ServiceType, table: Table) => new UserTable(table.name)
 * );
 * ```
 */
export class AttributeContainer<A = unknown> extends AutowiringContainer {
  constructor(
    readonly attribute: ServiceType<A>,
    injector?: IInjector,
    factory?: AutowireFactory
  ) {
    super(injector, factory);
  }

  has(type: ServiceType): boolean {
    return this.getAttribute(type) !== undefined;
  }

  protected override factoryArguments(type: ServiceType): ExplicitArguments {
    return { 0: type, 1: this.getAttribute(type) };
  }

  private getAttribute(type: ServiceType): A | undefined {
    return getAnnotations(type, this.attribute)[0];
  }
}
