/**
 * Tests for manifest.ts - API name extraction and manifest parsing
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import {
  baseIdentifier,
  parseApiName,
  parseManifest,
  readManifest,
  uniqueApiNames,
} from '../../src/analyzer/manifest';

describe('parseApiName', () => {
  it('should take everything before the first dot', () => {
    expect(parseApiName('foo.bar.baz')).toBe('foo');
    expect(parseApiName('drive.v3')).toBe('drive');
  });

  it('should return the whole identifier when there is no dot', () => {
    expect(parseApiName('foo')).toBe('foo');
  });

  it('should ignore leading directories', () => {
    expect(parseApiName('branch/drive.v3.json')).toBe('drive');
  });
});

describe('baseIdentifier', () => {
  it('should strip directories and whitespace', () => {
    expect(baseIdentifier('  documents/drive.v3.json \r')).toBe('drive.v3.json');
    expect(baseIdentifier('sheets.v4')).toBe('sheets.v4');
  });
});

describe('parseManifest', () => {
  it('should keep file order and drop blank lines', () => {
    expect(parseManifest('drive.v3\n\n  sheets.v4  \r\ngmail.v1')).toEqual([
      { identifier: 'drive.v3', name: 'drive' },
      { identifier: 'sheets.v4', name: 'sheets' },
      { identifier: 'gmail.v1', name: 'gmail' },
    ]);
  });

  it('should drop lines without an API name', () => {
    expect(parseManifest('.json\ndrive.v3\n')).toEqual([{ identifier: 'drive.v3', name: 'drive' }]);
  });
});

describe('uniqueApiNames', () => {
  it('should keep the first occurrence of each name', () => {
    const entries = parseManifest('drive.v2\nsheets.v4\ndrive.v3\n');
    expect(uniqueApiNames(entries)).toEqual(['drive', 'sheets']);
  });
});

describe('readManifest', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'autocommit-manifest-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read entries from disk', async () => {
    const path = join(dir, 'changed_files');
    await writeFile(path, 'drive.v3\n');

    expect(await readManifest(path)).toEqual([{ identifier: 'drive.v3', name: 'drive' }]);
  });

  it('should read a missing manifest as empty', async () => {
    expect(await readManifest(join(dir, 'missing'))).toEqual([]);
  });

  it('should rethrow errors other than a missing file', async () => {
    await expect(readManifest(dir)).rejects.toMatchObject({ code: 'EISDIR' });
  });
});
