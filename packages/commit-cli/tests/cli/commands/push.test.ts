/**
 * Tests for push.ts - the push command
 */

import { describe, it, expect } from 'vitest';
import { executePush } from '../../../src/cli/commands/push';
import { createTestContext } from '../../helpers/test-context';

describe('executePush', () => {
  it('should push to the configured remote', async () => {
    const { ctx, lines, vcs } = createTestContext('/repo');

    const exitCode = await executePush(ctx, {});

    expect(exitCode).toBe(0);
    expect(vcs[0]?.remotes).toEqual(['origin']);
    expect(lines).toEqual(['Pushed 1 commit(s) to origin/main.']);
  });

  it('should push to the remote given by flag', async () => {
    const { ctx, lines, vcs } = createTestContext('/repo');

    await executePush(ctx, { remote: 'upstream' });

    expect(vcs[0]?.remotes).toEqual(['upstream']);
    expect(lines).toEqual(['Pushed 1 commit(s) to upstream/main.']);
  });

  it('should exit with 1 when the push fails', async () => {
    const { ctx, lines } = createTestContext('/repo', {
      pushResult: { success: false, branch: 'main', commitsPushed: 0, error: 'rejected' },
    });

    const exitCode = await executePush(ctx, {});

    expect(exitCode).toBe(1);
    expect(lines).toEqual(['Push to origin/main failed: rejected']);
  });

  it('should print the result as JSON', async () => {
    const { ctx, lines } = createTestContext('/repo');

    await executePush(ctx, { json: true });

    expect(JSON.parse(lines[0] ?? '')).toEqual({ success: true, remote: 'origin', branch: 'main', commits: 1 });
  });
});
