/**
 * Manifest of changed API identifiers
 */

import { readFile } from 'node:fs/promises';
import type { ManifestEntry } from '@discovery-autocommit/commit-contracts';

/**
 * Last path segment of a manifest line (`dir/drive.v3.json` → `drive.v3.json`)
 */
export function baseIdentifier(line: string): string {
  const segments = line.trim().split(/[\\/]/);
  return segments[segments.length - 1] ?? '';
}

/**
 * API name of an identifier: everything before the first dot
 *
 * @example
 * parseApiName('drive.v3'); // 'drive'
 * parseApiName('foo.bar.baz'); // 'foo'
 * parseApiName('foo'); // 'foo'
 */
export function parseApiName(identifier: string): string {
  const base = baseIdentifier(identifier);
  const dot = base.indexOf('.');
  return dot === -1 ? base : base.slice(0, dot);
}

/**
 * Parse manifest content into entries, in file order.
 * Blank lines and lines without a name (e.g. `.json`) are dropped.
 */
export function parseManifest(content: string): ManifestEntry[] {
  const entries: ManifestEntry[] = [];

  for (const raw of content.split(/\r?\n/)) {
    const identifier = baseIdentifier(raw);
    if (!identifier) continue;

    const name = parseApiName(identifier);
    if (!name) continue;

    entries.push({ identifier, name });
  }

  return entries;
}

/**
 * Read the manifest. A missing manifest reads as empty.
 */
export async function readManifest(path: string): Promise<ManifestEntry[]> {
  try {
    const content = await readFile(path, 'utf-8');
    return parseManifest(content);
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }
}

/**
 * Distinct API names in first-seen order
 */
export function uniqueApiNames(entries: ManifestEntry[]): string[] {
  return [...new Set(entries.map((e) => e.name))];
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
