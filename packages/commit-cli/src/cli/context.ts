/**
 * Per-invocation context shared by all commands
 */

import { resolve } from 'node:path';
import type { AutocommitConfig } from '@discovery-autocommit/commit-contracts';
import {
  SimpleGitClient,
  createLogger,
  type Logger,
  type VcsClient,
} from '@discovery-autocommit/commit-core';
import { loadConfig } from '../config/load-config';
import { OutputRenderer, type WriteLine } from '../output/renderer';

// A type alias, so it satisfies commander's OptionValues index signature
export type GlobalOptions = {
  cwd?: string;
  config?: string;
  verbose?: boolean;
};

export interface CommandContext {
  /** Repository root all configured paths are relative to */
  cwd: string;
  config: AutocommitConfig;
  logger: Logger;
  verbose: boolean;
  createVcs: (config: AutocommitConfig) => VcsClient;
  createRenderer: (json: boolean) => OutputRenderer;
}

export type ContextFactory = (options: GlobalOptions) => Promise<CommandContext>;

export async function createContext(options: GlobalOptions): Promise<CommandContext> {
  const cwd = resolve(options.cwd ?? process.cwd());
  const verbose = options.verbose ?? false;
  const config = await loadConfig({ cwd, configPath: options.config });
  const logger = createLogger({ level: verbose ? 'debug' : undefined });
  const write: WriteLine = (line) => console.log(line);

  return {
    cwd,
    config,
    logger,
    verbose,
    createVcs: (effective) =>
      new SimpleGitClient({
        cwd,
        identity: effective.identity,
        remote: effective.git.remote,
        logger: logger.child({ module: 'git' }),
      }),
    createRenderer: (json) => new OutputRenderer(json, write),
  };
}
