/**
 * Commit orchestration: one commit per changed API that has a summary file
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type {
  AutocommitConfig,
  CommitOutcome,
  PushResult,
  RunReport,
} from '@discovery-autocommit/commit-contracts';
import type { OrchestratorOptions, VcsClient } from '../types';
import { readManifest, uniqueApiNames } from '../analyzer/manifest';
import { getArtifactPatterns, getSummaryPath } from '../analyzer/artifact-set';
import { SummaryMissingError, errorMessage } from '../errors';
import { orchestratorLogger, type Logger } from '../logger';

type CommittedOutcome = Extract<CommitOutcome, { status: 'committed' }>;

export class CommitOrchestrator {
  private readonly cwd: string;
  private readonly config: AutocommitConfig;
  private readonly vcs: VcsClient;
  private readonly manifestPath: string;
  private readonly dryRun: boolean;
  private readonly log: Logger;

  constructor(options: OrchestratorOptions) {
    this.cwd = options.cwd;
    this.config = options.config;
    this.vcs = options.vcs;
    this.manifestPath = resolve(options.cwd, options.manifestPath ?? options.config.paths.manifest);
    this.dryRun = options.dryRun ?? false;
    this.log = options.logger ?? orchestratorLogger;
  }

  /**
   * Process every API named in the manifest, in order, one at a time
   */
  async run(): Promise<RunReport> {
    const entries = await readManifest(this.manifestPath);
    const apis = uniqueApiNames(entries);

    const outcomes: CommitOutcome[] = [];
    let aborted = false;

    if (apis.length === 0) {
      this.log.info({ manifest: this.manifestPath }, 'Manifest is missing or empty, nothing to commit');
    }

    for (const api of apis) {
      const outcome = await this.processApi(api);
      outcomes.push(outcome);

      if (outcome.status === 'failed' && this.config.onError === 'abort') {
        aborted = true;
        this.log.warn({ api }, 'Stopping batch after failure');
        break;
      }
    }

    const report: RunReport = {
      manifestPath: this.manifestPath,
      outcomes,
      counts: countOutcomes(outcomes),
      aborted,
    };

    if (this.shouldPush('once') && report.counts.committed > 0) {
      report.push = await this.push();
    }

    return report;
  }

  /**
   * Commit the artifacts of a single API using its summary file as message
   */
  async processApi(api: string): Promise<CommitOutcome> {
    const summaryPath = getSummaryPath(this.cwd, this.config.paths, api);

    if (!existsSync(summaryPath)) {
      if (this.config.strict) {
        const error = new SummaryMissingError(api, summaryPath);
        this.log.error({ api, summaryPath }, error.message);
        return { status: 'failed', api, error: error.message };
      }

      this.log.debug({ api, summaryPath }, 'No summary file, skipping');
      return { status: 'skipped', api, summaryPath };
    }

    const patterns = getArtifactPatterns(this.config.paths, api);

    try {
      const paths = await this.vcs.changedPaths(patterns);

      if (paths.length === 0) {
        this.log.info({ api, patterns }, 'No artifact changes to commit');
        return { status: 'unchanged', api, patterns };
      }

      const message = await readFile(summaryPath, 'utf-8');

      if (this.dryRun) {
        this.log.info({ api, paths: paths.length }, 'Would commit');
        return { status: 'planned', api, message, paths };
      }

      await this.vcs.stage(paths);
      const sha = await this.vcs.commit(paths, message);
      this.log.info({ api, sha, paths: paths.length }, 'Committed');

      const outcome: CommittedOutcome = { status: 'committed', api, sha, message, paths, pushed: false };

      if (this.shouldPush('each')) {
        const pushResult = await this.push();
        outcome.pushed = pushResult.success;
        if (!pushResult.success) {
          outcome.pushError = pushResult.error ?? 'Unknown error';
        }
      }

      return outcome;
    } catch (error) {
      const message = errorMessage(error);
      this.log.error({ api, err: error }, `Failed to commit ${api}`);
      return { status: 'failed', api, error: message };
    }
  }

  private shouldPush(mode: AutocommitConfig['git']['pushMode']): boolean {
    return !this.dryRun && this.config.git.push && this.config.git.pushMode === mode;
  }

  private async push(): Promise<PushResult> {
    const result = await this.vcs.push();

    if (result.success) {
      this.log.info(
        { remote: result.remote, branch: result.branch, commits: result.commitsPushed },
        'Pushed'
      );
    } else {
      this.log.error({ remote: result.remote, branch: result.branch }, `Push failed: ${result.error}`);
    }

    return result;
  }
}

export function countOutcomes(outcomes: CommitOutcome[]): RunReport['counts'] {
  const counts: RunReport['counts'] = {
    committed: 0,
    planned: 0,
    skipped: 0,
    unchanged: 0,
    failed: 0,
  };

  for (const outcome of outcomes) {
    counts[outcome.status] += 1;
  }

  return counts;
}

/**
 * A run is clean when no API failed and no push failed
 */
export function isSuccessfulRun(report: RunReport): boolean {
  if (report.counts.failed > 0) return false;
  if (report.push && !report.push.success) return false;
  return !report.outcomes.some((o) => o.status === 'committed' && o.pushError !== undefined);
}
