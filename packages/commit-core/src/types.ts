/**
 * Core types for discovery autocommit
 *
 * Note: Zod schemas and inferred types are in @discovery-autocommit/commit-contracts.
 * This file contains internal types used within commit-core.
 */

import type {
  AutocommitConfig,
  IdentityConfig,
  PushResult,
} from '@discovery-autocommit/commit-contracts';
import type { Logger } from './logger';

// Re-export types from contracts for convenience
export type {
  AutocommitConfig,
  ApiChangeSummary,
  ChangeType,
  CommitOutcome,
  CommitStatus,
  DiscoveryChange,
  IdentityConfig,
  ManifestEntry,
  PushResult,
  RunReport,
} from '@discovery-autocommit/commit-contracts';

// ============================================================================
// Version Control
// ============================================================================

/**
 * The narrow slice of version control the orchestrator needs.
 *
 * Production code uses {@link SimpleGitClient}; tests substitute an
 * in-memory fake.
 */
export interface VcsClient {
  /**
   * Paths with staged, unstaged or untracked changes that match any of the
   * glob patterns (repo-relative, forward slashes)
   */
  changedPaths(patterns: string[]): Promise<string[]>;
  stage(paths: string[]): Promise<void>;
  /**
   * Commit exactly `paths` with `message` kept verbatim
   *
   * @returns Hash of the new commit
   */
  commit(paths: string[], message: string): Promise<string>;
  push(): Promise<PushResult>;
}

export interface GitClientOptions {
  /** Repository root */
  cwd: string;
  /** Applied per invocation via `git -c`, never written to git config */
  identity: IdentityConfig;
  /** Remote name (default: origin) */
  remote?: string;
  logger?: Logger;
}

// ============================================================================
// Orchestrator
// ============================================================================

export interface OrchestratorOptions {
  /** Working directory the configured paths are relative to */
  cwd: string;
  config: AutocommitConfig;
  vcs: VcsClient;
  /** Overrides `config.paths.manifest` */
  manifestPath?: string;
  /** Resolve and report, but never stage, commit or push */
  dryRun?: boolean;
  logger?: Logger;
}

// ============================================================================
// Summarizer
// ============================================================================

export interface SummarizeOptions {
  /** Directory with the freshly generated discovery documents */
  newArtifactsDir: string;
  /** Directory with the currently published discovery documents */
  currentArtifactsDir: string;
  /** Discovery file names such as `drive.v3.json` */
  files: string[];
  ignoredKeys: string[];
  logger?: Logger;
}
