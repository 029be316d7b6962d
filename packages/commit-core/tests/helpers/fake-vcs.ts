/**
 * In-memory VcsClient for orchestrator tests
 */

import type { PushResult } from '@discovery-autocommit/commit-contracts';
import { filterByPatterns } from '../../src/analyzer/git-status';
import type { VcsClient } from '../../src/types';

export interface FakeCommit {
  sha: string;
  paths: string[];
  message: string;
}

export class FakeVcsClient implements VcsClient {
  /** Paths with uncommitted changes, in insertion order */
  readonly changed = new Set<string>();
  readonly staged: string[][] = [];
  readonly commits: FakeCommit[] = [];
  pushCount = 0;
  pushResult: PushResult = { success: true, remote: 'origin', branch: 'main', commitsPushed: 1 };
  /** Commits touching any of these paths throw */
  readonly failingPaths = new Set<string>();

  constructor(changed: string[] = []) {
    for (const path of changed) {
      this.changed.add(path);
    }
  }

  async changedPaths(patterns: string[]): Promise<string[]> {
    return filterByPatterns([...this.changed], patterns);
  }

  async stage(paths: string[]): Promise<void> {
    this.staged.push([...paths]);
  }

  async commit(paths: string[], message: string): Promise<string> {
    const failing = paths.find((p) => this.failingPaths.has(p));
    if (failing) {
      throw new Error(`cannot commit ${failing}`);
    }

    const sha = `sha${this.commits.length + 1}`;
    this.commits.push({ sha, paths: [...paths], message });
    for (const path of paths) {
      this.changed.delete(path);
    }
    return sha;
  }

  async push(): Promise<PushResult> {
    this.pushCount += 1;
    return this.pushResult;
  }
}
