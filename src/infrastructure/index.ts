/**
 * @module wirestack/infrastructure
 * @description Reflection, logging and configuration
 */

export * from './reflection';
export * from './logging';
export * from './config';
