/**
 * Manifest and working-tree analysis
 * @module @discovery-autocommit/commit-core/analyzer
 */

export {
  readManifest,
  parseManifest,
  parseApiName,
  baseIdentifier,
  uniqueApiNames,
} from './manifest';

export { getSummaryPath, getArtifactPatterns } from './artifact-set';

export { getChangedFiles, filterByPatterns, getCurrentBranch } from './git-status';
