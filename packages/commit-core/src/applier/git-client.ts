/**
 * simple-git backed implementation of the VCS client
 */

import { simpleGit, type SimpleGit } from 'simple-git';
import type { PushResult } from '@discovery-autocommit/commit-contracts';
import type { GitClientOptions, VcsClient } from '../types';
import { filterByPatterns, getChangedFiles } from '../analyzer/git-status';
import { pushCommits } from './push';
import { GitError, errorMessage } from '../errors';
import { gitLogger, type Logger } from '../logger';

/**
 * Paths come from `git status`, so glob characters in them are part of
 * the file name
 */
function literal(paths: string[]): string[] {
  return paths.map((path) => `:(literal)${path}`);
}

export class SimpleGitClient implements VcsClient {
  private readonly git: SimpleGit;
  private readonly remote: string;
  private readonly log: Logger;
  private prefix: Promise<string> | undefined;

  constructor(options: GitClientOptions) {
    this.git = simpleGit({
      baseDir: options.cwd,
      config: [`user.name=${options.identity.name}`, `user.email=${options.identity.email}`],
    });
    this.remote = options.remote ?? 'origin';
    this.log = options.logger ?? gitLogger;
  }

  /**
   * Status paths are repo-relative; patterns and the returned paths are
   * relative to `cwd`, which may be a subdirectory of the repository.
   */
  async changedPaths(patterns: string[]): Promise<string[]> {
    const prefix = await this.cwdPrefix();
    const changed = await this.run('status', () => getChangedFiles(this.git));
    const local = changed.filter((path) => path.startsWith(prefix)).map((path) => path.slice(prefix.length));
    return filterByPatterns(local, patterns);
  }

  async stage(paths: string[]): Promise<void> {
    if (paths.length === 0) return;

    this.log.debug({ paths }, 'Staging paths');
    await this.run('add', () => this.git.add(literal(paths)));
  }

  async commit(paths: string[], message: string): Promise<string> {
    // Pathspecs restrict the commit to `paths` even if other files are staged
    await this.run('commit', () =>
      this.git.commit(message, literal(paths), {
        '--cleanup': 'verbatim',
        '--allow-empty-message': null,
      })
    );

    const sha = await this.run('rev-parse', () => this.git.revparse(['HEAD']));
    return sha.trim();
  }

  async push(): Promise<PushResult> {
    this.log.debug({ remote: this.remote }, 'Pushing');
    return pushCommits(this.git, this.remote);
  }

  private cwdPrefix(): Promise<string> {
    this.prefix ??= this.run('rev-parse', () => this.git.revparse(['--show-prefix'])).then((out) => out.trim());
    return this.prefix;
  }

  private async run<T>(operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      throw new GitError(`git ${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
