/**
 * Tests for program.ts - command wiring and global options
 */

import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { mkdtemp, rm } from 'node:fs/promises';
import type { GlobalOptions } from '../src/cli/context';
import { createProgram } from '../src/program';
import { createTestContext, type TestContext } from './helpers/test-context';

describe('createProgram', () => {
  const dirs: string[] = [];

  afterEach(async () => {
    process.exitCode = undefined;
    await Promise.all(dirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  const setup = async () => {
    const cwd = await mkdtemp(join(tmpdir(), 'autocommit-program-'));
    dirs.push(cwd);
    const received: GlobalOptions[] = [];
    let test: TestContext | undefined;
    const program = createProgram(async (options) => {
      received.push(options);
      test = createTestContext(options.cwd ?? cwd);
      return test.ctx;
    });
    return { cwd, program, received, lines: () => test?.lines ?? [] };
  };

  it('should register the three commands', async () => {
    const { program } = await setup();

    expect(program.commands.map((c) => c.name())).toEqual(['commit', 'summarize', 'push']);
  });

  it('should run commit when no command is given', async () => {
    const { cwd, program, received, lines } = await setup();

    await program.parseAsync(['node', 'discovery-autocommit', '--cwd', cwd]);

    expect(received[0]?.cwd).toBe(cwd);
    expect(lines()).toEqual(['Nothing to commit: manifest is missing or empty.']);
    expect(process.exitCode).toBe(0);
  });

  it('should pass global options to subcommands', async () => {
    const { cwd, program, received, lines } = await setup();

    await program.parseAsync(['node', 'discovery-autocommit', '--cwd', cwd, '--verbose', 'push', '-r', 'upstream']);

    expect(received[0]).toMatchObject({ cwd, verbose: true });
    expect(lines()).toEqual(['Pushed 1 commit(s) to upstream/main.']);
  });
});
