/**
 * @module wirestack/domain
 * @description Domain layer exports
 */

// ============================================================================
// Errors
// ============================================================================

export * from './exceptions';

// ============================================================================
// Lifetimes
// ============================================================================

/**
 * @example
 * ```typescript
 * import { singletonStrategyFactory } from 'wirestack';
 *
 * container.addContainer(new NamespaceContainer('app'), singletonStrategyFactory);
 * ```
 */
export * from './lifetime';

// ============================================================================
// Resolution
// ============================================================================

export * from './resolution';
