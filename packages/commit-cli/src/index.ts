#!/usr/bin/env node
/**
 * Discovery Autocommit CLI
 *
 * @module @discovery-autocommit/commit-cli
 */

import { isUserError } from '@discovery-autocommit/commit-core';
import { createProgram } from './program';
import { OutputRenderer } from './output/renderer';

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const opts = program.opts<{ verbose?: boolean }>();
    const json = process.argv.includes('--json');
    new OutputRenderer(json, (line) => console.error(line)).renderError(error, opts.verbose ?? false);

    process.exitCode = isUserError(error) ? 2 : 1;
  }
}

void main();
