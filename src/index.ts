/**
 * @fileoverview wirestack - Dependency injection for Node.js
 * @description
 * A type-keyed container with singleton and transient lifetimes, constructor
 * and function autowiring, nested containers and context-selected bindings.
 *
 * ## Architecture Layers
 *
 * | Layer | Contents |
 * |-------|----------|
 * | Domain | errors, lifetime strategies, resolution frames |
 * | Application | instance providers, injectors, containers, contexts |
 * | Infrastructure | reflection and decorators, logging, configuration |
 *
 * ## Quick Start
 *
 * ```typescript
 * import 'reflect-metadata';
 * import { Container, Injectable } from 'wirestack';
 *
 * class Config {
 *   readonly dsn = 'memory://';
 * }
 *
 * @Injectable()
 * class Database {
 *   constructor(readonly config: Config) {}
 * }
 *
 * const container = new Container()
 *   .addSingletonClass(Config)
 *   .addSingletonClass(Database);
 *
 * container.get(Database).config.dsn; // 'memory://'
 * ```
 *
 * @packageDocumentation
 * @module wirestack
 * @version 1.0.0
 */

import 'reflect-metadata';

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';

export const VERSION = '1.0.0';
