/**
 * @module wirestack/application
 * @description Application layer exports
 */

// ============================================================================
// Instance Providers
// ============================================================================

export * from './provision';

// ============================================================================
// Injection
// ============================================================================

export * from './injection';

// ============================================================================
// Containers
// ============================================================================

export * from './di';

// ============================================================================
// Contexts
// ============================================================================

export * from './context';
