/**
 * Commit message generator module
 * @module @discovery-autocommit/commit-core/generator
 */

export {
  detectDiscoveryChanges,
  diffDocuments,
  summarizeChanges,
  sortChanges,
  buildSummaryMessage,
  formatVerboseChanges,
  formatSummaryFile,
  writeSummaryFiles,
  removeSummaryFiles,
  parseDiscoveryFileName,
  isIgnoredKey,
} from './change-summary';
export { flattenDocument, type FlatDocument } from './flatten';
