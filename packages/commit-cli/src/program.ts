import { Command } from 'commander';
import { version } from '../package.json';
import { createContext, type ContextFactory } from './cli/context';
import {
  registerCommitCommand,
  registerPushCommand,
  registerSummarizeCommand,
} from './cli/commands';

export const CLI_NAME = 'discovery-autocommit';

export function createProgram(contextFactory: ContextFactory = createContext): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Commit regenerated API discovery documents and docs, one commit per API')
    .version(version)
    .option('--cwd <path>', 'Repository root (default: current directory)')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging');

  registerCommitCommand(program, contextFactory);
  registerSummarizeCommand(program, contextFactory);
  registerPushCommand(program, contextFactory);

  return program;
}
