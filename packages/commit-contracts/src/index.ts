/**
 * Discovery Autocommit Contracts
 *
 * Schemas, configuration and flag definitions shared by core and CLI.
 *
 * @module @discovery-autocommit/commit-contracts
 */

export * from './types/config';
export * from './schema';
export * from './flags';
export * from './env';
