/**
 * Discovery Autocommit Core
 *
 * Commits regenerated API artifacts, one commit per changed API.
 *
 * @module @discovery-autocommit/commit-core
 */

// Types
export * from './types';

// Errors
export * from './errors';

// Logging
export {
  createLogger,
  logger,
  orchestratorLogger,
  gitLogger,
  summaryLogger,
  type Logger,
  type LoggerOptions,
} from './logger';

// Analyzer
export * from './analyzer';

// Generator
export * from './generator';

// Applier
export * from './applier';
