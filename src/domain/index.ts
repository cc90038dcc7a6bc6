/**
 * Domain Layer - Public API
 */

export * from './shared';
export * from './travel';
