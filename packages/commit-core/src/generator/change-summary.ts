/**
 * Discovery change summary
 *
 * Compares freshly generated discovery documents against the published ones
 * and turns the differences into one conventional-commit message per API.
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { isDeepStrictEqual } from 'node:util';
import {
  CHANGE_TYPE_ORDER,
  type ApiChangeSummary,
  type ChangeType,
  type DiscoveryChange,
} from '@discovery-autocommit/commit-contracts';
import type { SummarizeOptions } from '../types';
import { flattenDocument } from './flatten';
import { ArtifactsDirNotFoundError, FileListEmptyError } from '../errors';
import { summaryLogger } from '../logger';

const CHANGE_HEADINGS: Record<ChangeType, string> = {
  deleted: 'The following keys were deleted:',
  added: 'The following keys were added:',
  changed: 'The following keys were changed:',
};

/**
 * Name and version of a discovery file
 *
 * @example
 * parseDiscoveryFileName('drive.v3.json'); // { name: 'drive', version: 'v3' }
 */
export function parseDiscoveryFileName(file: string): { name: string; version: string } {
  const [name = '', version = ''] = file.split('.');
  return { name, version };
}

/**
 * Case-insensitive substring match against the ignored terms
 */
export function isIgnoredKey(key: string, ignoredKeys: string[]): boolean {
  const lower = key.toLowerCase();
  return ignoredKeys.some((term) => lower.includes(term.toLowerCase()));
}

/**
 * Key-level differences between two versions of one discovery document.
 * `null` stands for a document that does not exist on that side.
 */
export function diffDocuments(
  file: string,
  current: unknown,
  next: unknown,
  ignoredKeys: string[]
): DiscoveryChange[] {
  const { name, version } = parseDiscoveryFileName(file);
  const before = flattenDocument(current);
  const after = flattenDocument(next);
  const keys = new Set([...before.keys(), ...after.keys()]);
  const changes: DiscoveryChange[] = [];

  for (const key of keys) {
    if (isIgnoredKey(key, ignoredKeys)) continue;

    const inBefore = before.has(key);
    const inAfter = after.has(key);

    let changeType: ChangeType;
    if (!inAfter) {
      changeType = 'deleted';
    } else if (!inBefore) {
      changeType = 'added';
    } else if (!isDeepStrictEqual(before.get(key), after.get(key))) {
      changeType = 'changed';
    } else {
      continue;
    }

    changes.push({ name, version, key, changeType });
  }

  return changes;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Sort by name, version, change type (deleted, added, changed), then key
 */
export function sortChanges(changes: DiscoveryChange[]): DiscoveryChange[] {
  return [...changes].sort(
    (a, b) =>
      compareStrings(a.name, b.name) ||
      compareStrings(a.version, b.version) ||
      CHANGE_TYPE_ORDER[a.changeType] - CHANGE_TYPE_ORDER[b.changeType] ||
      compareStrings(a.key, b.key)
  );
}

/**
 * Conventional-commit subject for an API
 *
 * @example
 * buildSummaryMessage('drive', true, true); // 'feat(drive)!: update the api'
 * buildSummaryMessage('drive', false, false); // 'fix(drive): update the api'
 */
export function buildSummaryMessage(name: string, isFeature: boolean, isBreaking: boolean): string {
  const commitType = isFeature ? 'feat' : 'fix';
  const breaking = isBreaking ? '!' : '';
  return `${commitType}(${name})${breaking}: update the api`;
}

/**
 * Key listing for already sorted changes of one or more APIs
 */
export function formatVerboseChanges(changes: DiscoveryChange[]): string {
  const blocks: string[] = [];
  let current: { id: string; sections: string[] } | null = null;
  let lastType: ChangeType | null = null;
  let keys: string[] = [];

  const flushSection = () => {
    if (current && lastType && keys.length > 0) {
      current.sections.push([CHANGE_HEADINGS[lastType], ...keys.map((k) => `- ${k}`)].join('\n'));
    }
    keys = [];
  };

  const flushBlock = () => {
    flushSection();
    if (current) {
      blocks.push(current.sections.join('\n\n'));
    }
  };

  for (const change of changes) {
    const id = `${change.name}:${change.version}`;

    if (!current || current.id !== id) {
      flushBlock();
      current = { id, sections: [`#### ${id}`] };
      lastType = null;
    }

    if (change.changeType !== lastType) {
      flushSection();
      lastType = change.changeType;
    }

    keys.push(change.key);
  }

  flushBlock();

  return blocks.join('\n\n');
}

/**
 * Group sorted changes into one summary per API name
 */
export function summarizeChanges(changes: DiscoveryChange[]): ApiChangeSummary[] {
  const byName = new Map<string, DiscoveryChange[]>();

  for (const change of sortChanges(changes)) {
    const list = byName.get(change.name) ?? [];
    list.push(change);
    byName.set(change.name, list);
  }

  return [...byName.entries()].map(([name, apiChanges]) => {
    const isBreaking = apiChanges.some((c) => c.changeType === 'deleted');
    const isFeature = isBreaking || apiChanges.some((c) => c.changeType === 'added');

    return {
      name,
      isFeature,
      isBreaking,
      summary: buildSummaryMessage(name, isFeature, isBreaking),
      verbose: formatVerboseChanges(apiChanges),
      changes: apiChanges,
    };
  });
}

async function loadDocument(dir: string, file: string): Promise<unknown> {
  const path = join(dir, file);
  if (!existsSync(path)) {
    return null;
  }
  const content = await readFile(path, 'utf-8');
  return JSON.parse(content);
}

/**
 * Compare every listed discovery file between the two artifact directories
 */
export async function detectDiscoveryChanges(options: SummarizeOptions): Promise<ApiChangeSummary[]> {
  const log = options.logger ?? summaryLogger;

  if (options.files.length === 0) {
    throw new FileListEmptyError();
  }
  for (const dir of [options.newArtifactsDir, options.currentArtifactsDir]) {
    if (!existsSync(dir)) {
      throw new ArtifactsDirNotFoundError(dir);
    }
  }

  const perFile = await Promise.all(
    options.files.map(async (file) => {
      const [current, next] = await Promise.all([
        loadDocument(options.currentArtifactsDir, file),
        loadDocument(options.newArtifactsDir, file),
      ]);
      const changes = diffDocuments(file, current, next, options.ignoredKeys);
      log.debug({ file, changes: changes.length }, 'Compared discovery document');
      return changes;
    })
  );

  return summarizeChanges(perFile.flat());
}

/**
 * Commit message stored in an API's summary file
 */
export function formatSummaryFile(summary: ApiChangeSummary): string {
  return `${summary.summary}\n\n${summary.verbose}\n`;
}

/**
 * Delete the summary files of `names` left by an earlier run, so an API
 * without changes this time has no file
 *
 * @returns Paths that existed and were removed
 */
export async function removeSummaryFiles(
  names: string[],
  dir: string,
  extension = '.verbose'
): Promise<string[]> {
  const removed: string[] = [];
  for (const name of names) {
    const path = join(dir, `${name}${extension}`);
    if (existsSync(path)) {
      await rm(path, { force: true });
      removed.push(path);
    }
  }
  return removed;
}

/**
 * Write `<dir>/<name><extension>` for every summary
 *
 * @returns Paths written, in summary order
 */
export async function writeSummaryFiles(
  summaries: ApiChangeSummary[],
  dir: string,
  extension = '.verbose'
): Promise<string[]> {
  await mkdir(dir, { recursive: true });

  const written: string[] = [];
  for (const summary of summaries) {
    const path = join(dir, `${summary.name}${extension}`);
    await writeFile(path, formatSummaryFile(summary));
    written.push(path);
  }

  return written;
}
