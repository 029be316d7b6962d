/**
 * Tests for git-client.ts - staging, verbatim commits and push against throwaway repositories
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { mkdir, mkdtemp, writeFile, rm } from 'node:fs/promises';
import { simpleGit, type SimpleGit } from 'simple-git';
import { SimpleGitClient } from '../../src/applier/git-client';
import { createLogger } from '../../src/logger';

const identity = { name: 'Yoshi Automation', email: 'yoshi-automation@google.com' };
const silent = createLogger({ level: 'silent', pretty: false });

const DOCS_DIR = 'googleapiclient/discovery_cache/documents';
const DRIVE_PATTERNS = [`${DOCS_DIR}/drive.*.json`, 'docs/dyn/drive_*.html'];

describe('SimpleGitClient', () => {
  let testRoot: string;
  let repo: string;
  let git: SimpleGit;

  beforeEach(async () => {
    testRoot = await mkdtemp(join(tmpdir(), 'autocommit-git-'));
    repo = join(testRoot, 'repo');
    await mkdir(join(repo, DOCS_DIR), { recursive: true });
    await mkdir(join(repo, 'docs', 'dyn'), { recursive: true });

    git = simpleGit(repo);
    await git.init();
    await git.addConfig('user.name', 'Test User');
    await git.addConfig('user.email', 'test@example.com');

    await writeFile(join(repo, DOCS_DIR, 'drive.v3.json'), '{"name":"drive"}');
    await writeFile(join(repo, 'docs', 'dyn', 'drive_v3.html'), '<html></html>');
    await writeFile(join(repo, DOCS_DIR, 'sheets.v4.json'), '{"name":"sheets"}');
  });

  afterEach(async () => {
    await rm(testRoot, { recursive: true, force: true });
  });

  const createClient = () => new SimpleGitClient({ cwd: repo, identity, logger: silent });

  it('should list untracked files matching the artifact patterns', async () => {
    const paths = await createClient().changedPaths(DRIVE_PATTERNS);

    expect([...paths].sort()).toEqual([`${DOCS_DIR}/drive.v3.json`, 'docs/dyn/drive_v3.html']);
  });

  it('should commit with the configured identity and a verbatim message', async () => {
    const client = createClient();
    const message = 'feat(drive)!: update the api\n\n#### drive:v3\n\nThe following keys were deleted:\n- schemas.File.id\n';
    const paths = await client.changedPaths(DRIVE_PATTERNS);

    await client.stage(paths);
    const sha = await client.commit(paths, message);

    expect(sha).toMatch(/^[0-9a-f]{40}$/);
    expect((await git.revparse(['HEAD'])).trim()).toBe(sha);

    const author = await git.raw(['log', '-1', '--format=%an <%ae>|%cn <%ce>']);
    expect(author.trim()).toBe(
      'Yoshi Automation <yoshi-automation@google.com>|Yoshi Automation <yoshi-automation@google.com>'
    );

    const rawCommit = await git.raw(['cat-file', 'commit', 'HEAD']);
    expect(rawCommit.endsWith(`\n\n${message}`)).toBe(true);
  });

  it('should commit only the given paths and leave other staged files staged', async () => {
    await writeFile(join(repo, 'README.md'), '# readme');
    await git.add('README.md');
    const client = createClient();
    const paths = await client.changedPaths(DRIVE_PATTERNS);

    await client.stage(paths);
    await client.commit(paths, 'feat: update Drive API');

    const committed = await git.raw(['show', '--name-only', '--format=', 'HEAD']);
    expect(committed.trim().split('\n').sort()).toEqual([`${DOCS_DIR}/drive.v3.json`, 'docs/dyn/drive_v3.html']);

    const status = await git.status();
    expect(status.staged).toContain('README.md');
    expect(status.not_added).toContain(`${DOCS_DIR}/sheets.v4.json`);
  });

  it('should report no changes once the artifacts are committed', async () => {
    const client = createClient();
    const paths = await client.changedPaths(DRIVE_PATTERNS);
    await client.stage(paths);
    await client.commit(paths, 'feat: update Drive API');

    expect(await client.changedPaths(DRIVE_PATTERNS)).toEqual([]);
  });

  it('should stage and commit deleted artifacts', async () => {
    const client = createClient();
    const initial = await client.changedPaths(DRIVE_PATTERNS);
    await client.stage(initial);
    await client.commit(initial, 'feat: add Drive API');

    await rm(join(repo, DOCS_DIR, 'drive.v3.json'));
    const paths = await client.changedPaths(DRIVE_PATTERNS);
    expect(paths).toEqual([`${DOCS_DIR}/drive.v3.json`]);

    await client.stage(paths);
    await client.commit(paths, 'feat(drive)!: remove v3');

    const log = await git.log();
    expect(log.all).toHaveLength(2);
    expect(log.latest?.message).toBe('feat(drive)!: remove v3');
  });

  it('should resolve patterns against a working directory below the repository root', async () => {
    const sub = join(repo, 'client');
    await mkdir(join(sub, DOCS_DIR), { recursive: true });
    await mkdir(join(sub, 'docs', 'dyn'), { recursive: true });
    await writeFile(join(sub, DOCS_DIR, 'drive.v3.json'), '{"name":"drive"}');
    await writeFile(join(sub, 'docs', 'dyn', 'drive_v3.html'), '<html></html>');
    const client = new SimpleGitClient({ cwd: sub, identity, logger: silent });

    const paths = await client.changedPaths(DRIVE_PATTERNS);
    expect([...paths].sort()).toEqual([`${DOCS_DIR}/drive.v3.json`, 'docs/dyn/drive_v3.html']);

    await client.stage(paths);
    await client.commit(paths, 'feat(drive): update the api');

    const committed = await git.raw(['show', '--name-only', '--format=', 'HEAD']);
    expect(committed.trim().split('\n').sort()).toEqual([
      `client/${DOCS_DIR}/drive.v3.json`,
      'client/docs/dyn/drive_v3.html',
    ]);
    expect(await client.changedPaths(DRIVE_PATTERNS)).toEqual([]);
  });

  it('should commit with an empty message', async () => {
    const client = createClient();
    const paths = await client.changedPaths(DRIVE_PATTERNS);

    await client.stage(paths);
    const sha = await client.commit(paths, '');

    expect((await git.revparse(['HEAD'])).trim()).toBe(sha);
    const rawCommit = await git.raw(['cat-file', 'commit', 'HEAD']);
    expect(rawCommit.endsWith('\n\n')).toBe(true);
  });

  it('should treat glob characters in file names literally', async () => {
    const client = createClient();
    const initial = await client.changedPaths(DRIVE_PATTERNS);
    await client.stage(initial);
    await client.commit(initial, 'feat: add Drive API');

    await writeFile(join(repo, DOCS_DIR, 'drive.v3.json'), '{"name":"drive","version":"v3"}');
    await writeFile(join(repo, DOCS_DIR, 'drive.v[3].json'), '{}');
    const bracketed = `${DOCS_DIR}/drive.v[3].json`;

    await client.stage([bracketed]);
    await client.commit([bracketed], 'fix(drive): update the api');

    const committed = await git.raw(['show', '--name-only', '--format=', 'HEAD']);
    expect(committed.trim()).toBe(bracketed);
    expect(await client.changedPaths(DRIVE_PATTERNS)).toEqual([`${DOCS_DIR}/drive.v3.json`]);
  });

  it('should wrap git failures in a GitError', async () => {
    const client = createClient();

    await expect(client.commit(['does-not-exist.json'], 'fix: nothing')).rejects.toMatchObject({
      name: 'GitError',
      code: 'GitError',
    });
  });

  describe('push', () => {
    it('should push local commits to the remote and then report nothing to push', async () => {
      const remote = join(testRoot, 'remote.git');
      await mkdir(remote);
      await simpleGit(remote).init(true);
      await git.addRemote('origin', remote);

      const client = createClient();
      const paths = await client.changedPaths(DRIVE_PATTERNS);
      await client.stage(paths);
      await client.commit(paths, 'feat: update Drive API');
      const branch = (await git.revparse(['--abbrev-ref', 'HEAD'])).trim();

      const first = await client.push();
      expect(first).toEqual({ success: true, remote: 'origin', branch, commitsPushed: 1 });

      const second = await client.push();
      expect(second).toEqual({ success: true, remote: 'origin', branch, commitsPushed: 0 });
    });

    it('should return a failed result when the remote does not exist', async () => {
      const client = createClient();
      const paths = await client.changedPaths(DRIVE_PATTERNS);
      await client.stage(paths);
      await client.commit(paths, 'feat: update Drive API');

      const result = await client.push();

      expect(result.success).toBe(false);
      expect(result.remote).toBe('origin');
      expect(result.commitsPushed).toBe(0);
      expect(result.error).toBeDefined();
    });
  });
});
