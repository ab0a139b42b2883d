/**
 * @fileoverview Context container
 *
 * @packageDocumentation
 * @module wirestack/application/context
 *
 * A context container holds named containers and a stack of active context
 * names. Requests are answered by the most recently pushed context that has
 * the type, falling back to the default context:
 *
 * ```
 * stack: [default] ← audit ← tenant-eu       (top: tenant-eu)
 *
 * get(Logger) → tenant-eu.has(Logger)?  no
 *             → audit.has(Logger)?      yes → audit.get(Logger)
 * ```
 *
 * Contexts are usually pushed by the {@link ContextInjector} from
 * `@Context()` declarations, and always popped before the request that
 * pushed them returns.
 */

import {
  ContextStackError,
  InstanceTypeError,
  UnknownContextError,
  UnresolvedTypeError,
} from '../../domain/exceptions';
import { getDefaultLogger } from '../../infrastructure/config';
import { ILogger } from '../../infrastructure/logging';
import {
  ContextName,
  ServiceType,
  describeContext,
  describeValue,
  isInstanceOf,
} from '../../infrastructure/reflection';
import { Container, ContainerOptions, IContainer } from '../di';
import { IInjector, InjectorProvider } from '../injection';
import { ContextInjector } from './ContextInjector';

export const DEFAULT_CONTEXT = 'default';

export interface ContextContainerOptions {
  /**
   * Context consulted after the stack.
   * @default 'default'
   */
  defaultContext?: ContextName;

  logger?: ILogger;
}

/**
 * Selects among named containers by a stack of active contexts.
 *
 * @example
 * ```typescript
 * const contexts = new ContextContainer();
 *
 * contexts.createContext(DEFAULT_CONTEXT).addSingletonClass(ConsoleSink);
 * contexts.createContext('audit').addSingletonImplementation(ConsoleSink, AuditSink);
 *
 * contexts.get(ConsoleSink);                                  // ConsoleSink
 * contexts.runInContext(['audit'], () => contexts.get(ConsoleSink)); // AuditSink
 * ```
 */
export class ContextContainer implements IContainer, InjectorProvider {
  private readonly contexts = new Map<ContextName, IContainer>();
  private readonly stack: ContextName[] = [];
  private readonly injector: ContextInjector;
  private readonly logger: ILogger;
  readonly defaultContext: ContextName;

  constructor(options: ContextContainerOptions = {}) {
    this.defaultContext = options.defaultContext ?? DEFAULT_CONTEXT;
    this.logger = options.logger ?? getDefaultLogger();
    this.injector = new ContextInjector(this);
  }

  // ==========================================================================
  // Contexts
  // ==========================================================================

  /**
   * Register `container` under `name`, replacing any previous one.
   */
  addContext(name: ContextName, container: IContainer): this {
    this.contexts.set(name, container);
    return this;
  }

  /**
   * Create and register a {@link Container} that autowires through this
   * context container's injector, so its classes honour `@Context()`.
   */
  createContext(name: ContextName, options: ContainerOptions = {}): Container {
    const container = new Container({
      logger: this.logger,
      ...options,
      injector: options.injector ?? this.injector,
    });
    this.addContext(name, container);
    return container;
  }

  /**
   * @throws {UnknownContextError} If no context is registered under `name`
   */
  context(name: ContextName): IContainer {
    const container = this.contexts.get(name);
    if (!container) {
      throw new UnknownContextError(name);
    }
    return container;
  }

  hasContext(name: ContextName): boolean {
    return this.contexts.has(name);
  }

  // ==========================================================================
  // Stack
  // ==========================================================================

  /**
   * @throws {UnknownContextError} If no context is registered under `name`
   */
  push(name: ContextName): void {
    if (!this.contexts.has(name)) {
      throw new UnknownContextError(name);
    }
    this.stack.push(name);
    this.logger.debug(`[ContextContainer] push ${describeContext(name)} (depth ${this.stack.length})`);
  }

  /**
   * @returns The context that was on top
   * @throws {ContextStackError} If the stack is empty
   */
  pop(): ContextName {
    const name = this.stack.pop();
    if (name === undefined) {
      throw new ContextStackError();
    }
    this.logger.debug(`[ContextContainer] pop ${describeContext(name)} (depth ${this.stack.length})`);
    return name;
  }

  /**
   * Active contexts, bottom first.
   */
  getStack(): readonly ContextName[] {
    return [...this.stack];
  }

  /**
   * Push `names` in order, run `callback`, then pop them again.
   */
  runInContext<R>(names: readonly ContextName[], callback: () => R): R {
    let pushed = 0;
    try {
      for (const name of names) {
        this.push(name);
        pushed++;
      }
      return callback();
    } finally {
      for (; pushed > 0; pushed--) {
        this.pop();
      }
    }
  }

  // ==========================================================================
  // IContainer
  // ==========================================================================

  has(type: ServiceType): boolean {
    return this.findContainer(type) !== undefined;
  }

  get<T>(type: ServiceType<T>): T {
    const container = this.findContainer(type);
    if (!container) {
      throw new UnresolvedTypeError(type);
    }

    const value: unknown = container.get(type);
    if (!isInstanceOf(value, type)) {
      throw new InstanceTypeError(type, describeValue(value));
    }
    return value;
  }

  getInjector(): IInjector {
    return this.injector;
  }

  private findContainer(type: ServiceType): IContainer | undefined {
    for (let index = this.stack.length - 1; index >= 0; index--) {
      const container = this.contexts.get(this.stack[index]);
      if (container?.has(type)) {
        return container;
      }
    }

    const fallback = this.contexts.get(this.defaultContext);
    return fallback?.has(type) ? fallback : undefined;
  }
}
