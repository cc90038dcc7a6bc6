/**
 * flight-connections - Public API
 */

export * from './domain';
export * from './application';
export * from './adapters/csv';
export { loadConfig } from './config/settings';
export type { AppConfig, EnvSource, Environment } from './config/settings';
export { createContainer } from './config/container';
export type { Container, ContainerOptions } from './config/container';
export * from './observability';
