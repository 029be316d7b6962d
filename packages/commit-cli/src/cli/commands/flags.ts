/**
 * Register shared flag definitions on commander commands
 *
 * DRY pattern: flags are defined once in contracts, used for both help
 * output and parsing here.
 */

import type { Command } from 'commander';
import type { FlagDefinition, FlagSet } from '@discovery-autocommit/commit-contracts';

/**
 * Commander option syntax for a flag
 *
 * @example
 * toOptionSyntax('manifest', { type: 'string', alias: 'm', valueName: 'path', description: '' });
 * // '-m, --manifest <path>'
 */
export function toOptionSyntax(name: string, flag: FlagDefinition): string {
  const short = flag.alias ? `-${flag.alias}, ` : '';
  const value = flag.type === 'string' ? ` <${flag.valueName ?? 'value'}>` : '';
  return `${short}--${name}${value}`;
}

export function applyFlags(command: Command, flags: FlagSet): Command {
  for (const [name, flag] of Object.entries(flags)) {
    command.option(toOptionSyntax(name, flag), flag.description);
  }
  return command;
}
