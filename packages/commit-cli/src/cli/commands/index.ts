// CLI commands
export * from './flags';
export { executeCommit, applyCommitFlags, registerCommitCommand } from './commit';
export { executeSummarize, registerSummarizeCommand, CHANGED_FILES_NAME } from './summarize';
export { executePush, registerPushCommand } from './push';
