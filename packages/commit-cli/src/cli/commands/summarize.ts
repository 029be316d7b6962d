/**
 * summarize command
 * Diff new discovery documents against current ones and write summary files
 */

import { join, resolve } from 'node:path';
import type { Command } from 'commander';
import {
  summarizeFlags,
  type SummarizeFlags,
  type SummarizeOutput,
} from '@discovery-autocommit/commit-contracts';
import {
  detectDiscoveryChanges,
  readManifest,
  removeSummaryFiles,
  uniqueApiNames,
  writeSummaryFiles,
} from '@discovery-autocommit/commit-core';
import type { CommandContext, ContextFactory, GlobalOptions } from '../context';
import { applyFlags } from './flags';

/**
 * Default list of changed files, written by the generator next to its output
 */
export const CHANGED_FILES_NAME = 'changed_files';

export async function executeSummarize(ctx: CommandContext, flags: SummarizeFlags): Promise<number> {
  const { config } = ctx;
  const renderer = ctx.createRenderer(flags.json ?? false);

  const newArtifactsDir = resolve(ctx.cwd, flags.newDir ?? config.summary.newArtifactsDir);
  const currentArtifactsDir = resolve(ctx.cwd, flags.currentDir ?? config.summary.currentArtifactsDir);
  const manifestPath = flags.manifest
    ? resolve(ctx.cwd, flags.manifest)
    : join(newArtifactsDir, CHANGED_FILES_NAME);
  const outDir = resolve(ctx.cwd, flags.outDir ?? config.paths.summaryDir);

  const entries = await readManifest(manifestPath);

  const apis = await detectDiscoveryChanges({
    newArtifactsDir,
    currentArtifactsDir,
    files: entries.map((e) => e.identifier),
    ignoredKeys: config.summary.ignoredKeys,
    logger: ctx.logger.child({ module: 'summary' }),
  });

  const stale = await removeSummaryFiles(uniqueApiNames(entries), outDir, config.paths.summaryExtension);
  if (stale.length > 0) {
    ctx.logger.debug({ stale }, 'Removed summary files from an earlier run');
  }

  const written = await writeSummaryFiles(apis, outDir, config.paths.summaryExtension);
  ctx.logger.info({ apis: apis.length, outDir }, 'Wrote summary files');

  const output: SummarizeOutput = { apis, written };
  renderer.renderSummaries(output);

  return 0;
}

export function registerSummarizeCommand(program: Command, createContext: ContextFactory): Command {
  const command = program
    .command('summarize')
    .description('Write a commit message per API from discovery document changes');

  applyFlags(command, summarizeFlags);

  command.action(async (flags: SummarizeFlags, cmd: Command) => {
    const ctx = await createContext(cmd.optsWithGlobals<GlobalOptions>());
    process.exitCode = await executeSummarize(ctx, flags);
  });

  return command;
}
