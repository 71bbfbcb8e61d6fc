/**
 * Database infrastructure
 * @module infrastructure/database
 */
export * from './database';
export * from './migrations';
export { InMemoryStorage } from './InMemoryStorage';
