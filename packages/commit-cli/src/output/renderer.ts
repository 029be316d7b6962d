import pc from 'picocolors';
import type {
  CommitOutcome,
  PushOutput,
  PushResult,
  RunReport,
  SummarizeOutput,
} from '@discovery-autocommit/commit-contracts';
import { AutocommitError, errorMessage } from '@discovery-autocommit/commit-core';

export type Colors = Omit<typeof pc, 'createColors' | 'isColorSupported'>;

export type WriteLine = (line: string) => void;

export class OutputRenderer {
  constructor(
    private readonly isJson: boolean,
    private readonly write: WriteLine = (line) => console.log(line),
    private readonly colors: Colors = pc
  ) {}

  renderRunReport(report: RunReport): void {
    if (this.isJson) {
      this.json(report);
      return;
    }

    const c = this.colors;

    if (report.outcomes.length === 0) {
      this.write(c.gray('Nothing to commit: manifest is missing or empty.'));
      return;
    }

    this.write(c.bold('APIs:'));
    for (const outcome of report.outcomes) {
      this.write(`  ${this.formatOutcome(outcome)}`);
    }

    const { counts } = report;
    const parts = [
      `${counts.committed} committed`,
      `${counts.skipped} skipped`,
      `${counts.unchanged} unchanged`,
      `${counts.failed} failed`,
    ];
    if (counts.planned > 0) {
      parts.unshift(`${counts.planned} planned`);
    }

    this.write('');
    this.write(`${c.bold('Summary:')} ${parts.join(', ')}`);

    if (report.aborted) {
      this.write(c.yellow('Stopped after the first failure.'));
    }
    if (report.push) {
      this.write(this.formatPush(report.push));
    }
  }

  renderSummaries(output: SummarizeOutput): void {
    if (this.isJson) {
      this.json(output);
      return;
    }

    const c = this.colors;

    if (output.apis.length === 0) {
      this.write(c.gray('No discovery changes detected.'));
      return;
    }

    for (const api of output.apis) {
      this.write(c.bold(api.summary));
    }
    for (const api of output.apis) {
      this.write('');
      this.write(api.verbose);
    }

    this.write('');
    this.write(c.gray(`Wrote ${output.written.length} summary file(s).`));
  }

  renderPush(result: PushResult): void {
    if (this.isJson) {
      const output: PushOutput = {
        success: result.success,
        remote: result.remote,
        branch: result.branch,
        commits: result.commitsPushed,
        ...(result.error ? { error: result.error } : {}),
      };
      this.json(output);
      return;
    }

    this.write(this.formatPush(result));
  }

  renderError(error: unknown, verbose = false): void {
    if (this.isJson) {
      this.json({
        error: {
          code: error instanceof AutocommitError ? error.code : 'UnknownError',
          message: errorMessage(error),
          ...(error instanceof AutocommitError && error.details ? { details: error.details } : {}),
        },
      });
      return;
    }

    const c = this.colors;
    this.write(c.red(`✖ Error: ${errorMessage(error)}`));

    if (error instanceof AutocommitError && error.details) {
      const details =
        typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2);
      this.write(`  Details: ${details}`);
    }
    if (verbose && error instanceof Error && error.stack) {
      this.write(`\nStack Trace:\n${error.stack}`);
    }
  }

  private formatOutcome(outcome: CommitOutcome): string {
    const c = this.colors;

    switch (outcome.status) {
      case 'committed': {
        const subject = outcome.message.split('\n')[0] ?? '';
        const shortSha = outcome.sha.substring(0, 7);
        const pushNote = outcome.pushError ? ` ${c.red(`(push failed: ${outcome.pushError})`)}` : '';
        return `${c.green('✔')} ${outcome.api} ${c.gray(`[${shortSha}]`)} ${subject}${pushNote}`;
      }
      case 'planned':
        return `${c.cyan('~')} ${outcome.api} would commit ${outcome.paths.length} file(s)`;
      case 'skipped':
        return `${c.gray('-')} ${outcome.api} skipped (no summary file)`;
      case 'unchanged':
        return `${c.gray('=')} ${outcome.api} unchanged`;
      case 'failed':
        return `${c.red('✖')} ${outcome.api} failed: ${outcome.error}`;
    }
  }

  private formatPush(result: PushResult): string {
    const c = this.colors;
    const target = `${result.remote}/${result.branch}`;

    if (!result.success) {
      return c.red(`Push to ${target} failed: ${result.error ?? 'Unknown error'}`);
    }
    if (result.commitsPushed === 0) {
      return c.gray(`Nothing to push, ${target} is up to date.`);
    }
    return c.green(`Pushed ${result.commitsPushed} commit(s) to ${target}.`);
  }

  private json(data: unknown): void {
    this.write(JSON.stringify(data, null, 2));
  }
}
