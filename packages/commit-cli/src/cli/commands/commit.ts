/**
 * commit command (default flow)
 * Manifest → summary files → one commit per API → (optional) push
 */

import type { Command } from 'commander';
import {
  commitFlags,
  type AutocommitConfig,
  type CommitFlags,
  type PushMode,
} from '@discovery-autocommit/commit-contracts';
import {
  CommitOrchestrator,
  UsageError,
  isSuccessfulRun,
} from '@discovery-autocommit/commit-core';
import type { CommandContext, ContextFactory, GlobalOptions } from '../context';
import { applyFlags } from './flags';

const PUSH_MODES: readonly PushMode[] = ['each', 'once'];

function isPushMode(value: string): value is PushMode {
  return PUSH_MODES.some((mode) => mode === value);
}

/**
 * CLI flags are the highest-priority config layer
 */
export function applyCommitFlags(config: AutocommitConfig, flags: CommitFlags): AutocommitConfig {
  const git = { ...config.git };
  const paths = { ...config.paths };

  if (flags.pushMode !== undefined) {
    if (!isPushMode(flags.pushMode)) {
      throw new UsageError(`Invalid --push-mode '${flags.pushMode}', expected one of: ${PUSH_MODES.join(', ')}`);
    }
    git.pushMode = flags.pushMode;
  }
  if (flags.push) {
    git.push = true;
  }
  if (flags.manifest) {
    paths.manifest = flags.manifest;
  }

  return {
    ...config,
    git,
    paths,
    strict: flags.strict ? true : config.strict,
    onError: flags.abortOnError ? 'abort' : config.onError,
  };
}

/**
 * @returns Process exit code
 */
export async function executeCommit(ctx: CommandContext, flags: CommitFlags): Promise<number> {
  const config = applyCommitFlags(ctx.config, flags);
  const renderer = ctx.createRenderer(flags.json ?? false);

  const orchestrator = new CommitOrchestrator({
    cwd: ctx.cwd,
    config,
    vcs: ctx.createVcs(config),
    dryRun: flags.dryRun ?? false,
    logger: ctx.logger.child({ module: 'orchestrator' }),
  });

  const report = await orchestrator.run();
  renderer.renderRunReport(report);

  return isSuccessfulRun(report) ? 0 : 1;
}

export function registerCommitCommand(program: Command, createContext: ContextFactory): Command {
  const command = program
    .command('commit', { isDefault: true })
    .description('Commit regenerated artifacts, one commit per API with a summary file');

  applyFlags(command, commitFlags);

  command.action(async (flags: CommitFlags, cmd: Command) => {
    const ctx = await createContext(cmd.optsWithGlobals<GlobalOptions>());
    process.exitCode = await executeCommit(ctx, flags);
  });

  return command;
}
