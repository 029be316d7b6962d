/**
 * Git push operations
 */

import type { SimpleGit } from 'simple-git';
import type { PushResult } from '@discovery-autocommit/commit-contracts';
import { getCurrentBranch } from '../analyzer/git-status';
import { errorMessage } from '../errors';

async function countRevisions(git: SimpleGit, range: string): Promise<number> {
  const output = await git.raw(['rev-list', '--count', range]);
  return Number.parseInt(output.trim(), 10) || 0;
}

/**
 * Local commits the remote branch does not have yet. A branch missing on
 * the remote counts every commit reachable from HEAD.
 */
export async function countUnpushedCommits(git: SimpleGit, remote: string, branch: string): Promise<number> {
  try {
    await git.fetch(remote, branch);
  } catch {
    return countRevisions(git, 'HEAD');
  }
  return countRevisions(git, `${remote}/${branch}..HEAD`);
}

/**
 * Push the current branch to `remote`
 *
 * Never throws: failures come back as `success: false` with the error text.
 * Pushing with nothing new is a successful no-op.
 */
export async function pushCommits(git: SimpleGit, remote = 'origin'): Promise<PushResult> {
  let branch = 'unknown';

  try {
    branch = await getCurrentBranch(git);
    const ahead = await countUnpushedCommits(git, remote, branch);

    if (ahead > 0) {
      await git.push(remote, branch);
    }

    return { success: true, remote, branch, commitsPushed: ahead };
  } catch (error) {
    return { success: false, remote, branch, commitsPushed: 0, error: errorMessage(error) };
  }
}
