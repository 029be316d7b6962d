/**
 * Commit application module
 * @module @discovery-autocommit/commit-core/applier
 */

export { CommitOrchestrator, countOutcomes, isSuccessfulRun } from './orchestrator';
export { SimpleGitClient } from './git-client';
export { pushCommits } from './push';
