/**
 * Per-API file locations: summary file and artifact globs
 */

import { join, posix } from 'node:path';
import type { PathsConfig } from '@discovery-autocommit/commit-contracts';

const NAME_PLACEHOLDER = /\{name\}/g;

/**
 * Path of the summary file holding the commit message for `api`
 *
 * @example
 * getSummaryPath('/repo', paths, 'drive'); // '/repo/temp/drive.verbose'
 */
export function getSummaryPath(cwd: string, paths: PathsConfig, api: string): string {
  return join(cwd, paths.summaryDir, `${api}${paths.summaryExtension}`);
}

/**
 * Repo-relative glob patterns of the generated artifacts for `api`
 *
 * @example
 * getArtifactPatterns(paths, 'drive');
 * // ['googleapiclient/discovery_cache/documents/drive.*.json', 'docs/dyn/drive_*.html']
 */
export function getArtifactPatterns(paths: PathsConfig, api: string): string[] {
  return [
    toPattern(paths.discoveryDir, paths.discoveryPattern, api),
    toPattern(paths.docsDir, paths.docsPattern, api),
  ];
}

function toPattern(dir: string, template: string, api: string): string {
  // Git reports paths with forward slashes, so patterns use them too
  const normalizedDir = dir.replace(/\\/g, '/').replace(/\/+$/, '');
  return posix.join(normalizedDir, template.replace(NAME_PLACEHOLDER, api));
}
