/**
 * push command
 * Push commits to remote
 */

import type { Command } from 'commander';
import { pushFlags, type PushFlags } from '@discovery-autocommit/commit-contracts';
import type { CommandContext, ContextFactory, GlobalOptions } from '../context';
import { applyFlags } from './flags';

export async function executePush(ctx: CommandContext, flags: PushFlags): Promise<number> {
  const config = flags.remote
    ? { ...ctx.config, git: { ...ctx.config.git, remote: flags.remote } }
    : ctx.config;
  const renderer = ctx.createRenderer(flags.json ?? false);

  const result = await ctx.createVcs(config).push();
  renderer.renderPush(result);

  return result.success ? 0 : 1;
}

export function registerPushCommand(program: Command, createContext: ContextFactory): Command {
  const command = program.command('push').description('Push commits to remote');

  applyFlags(command, pushFlags);

  command.action(async (flags: PushFlags, cmd: Command) => {
    const ctx = await createContext(cmd.optsWithGlobals<GlobalOptions>());
    process.exitCode = await executePush(ctx, flags);
  });

  return command;
}
