/**
 * Configuration Contract
 *
 * Defines the shape of the autocommit configuration stored in
 * discovery-autocommit.config.json at the repository root.
 *
 * Resolution order (lowest to highest priority):
 * defaults → config file → environment → CLI flags
 */

import { z } from 'zod';

/**
 * Committer identity applied to every commit the orchestrator creates
 */
export interface IdentityConfig {
  name: string;
  email: string;
}

/**
 * Working-tree layout. Patterns are relative to their directory and use
 * `{name}` as the API name placeholder.
 */
export interface PathsConfig {
  /** Manifest of changed API identifiers (default: changed_files) */
  manifest: string;
  /** Directory holding per-API summary files (default: temp) */
  summaryDir: string;
  /** Summary file extension, dot included (default: .verbose) */
  summaryExtension: string;
  discoveryDir: string;
  /** @example "{name}.*.json" */
  discoveryPattern: string;
  docsDir: string;
  /** @example "{name}_*.html" */
  docsPattern: string;
}

export type PushMode = 'each' | 'once';

export type ErrorPolicy = 'continue' | 'abort';

export interface GitConfig {
  /** Push after committing (default: false) */
  push: boolean;
  /** `each` pushes after every commit, `once` after the whole batch */
  pushMode: PushMode;
  remote: string;
}

/**
 * Inputs of the discovery change summarizer
 */
export interface SummaryConfig {
  /** Directory with the freshly generated discovery documents (default: branch) */
  newArtifactsDir: string;
  /** Directory with the currently published discovery documents (default: main) */
  currentArtifactsDir: string;
  /** Flattened keys containing any of these terms are not reported */
  ignoredKeys: string[];
}

export interface AutocommitConfig {
  identity: IdentityConfig;
  paths: PathsConfig;
  git: GitConfig;
  /** Treat a missing summary file as a failure instead of a skip */
  strict: boolean;
  onError: ErrorPolicy;
  summary: SummaryConfig;
}

export const defaultAutocommitConfig: AutocommitConfig = {
  identity: {
    name: 'Yoshi Automation',
    email: 'yoshi-automation@google.com',
  },
  paths: {
    manifest: 'changed_files',
    summaryDir: 'temp',
    summaryExtension: '.verbose',
    discoveryDir: 'googleapiclient/discovery_cache/documents',
    discoveryPattern: '{name}.*.json',
    docsDir: 'docs/dyn',
    docsPattern: '{name}_*.html',
  },
  git: {
    push: false,
    pushMode: 'each',
    remote: 'origin',
  },
  strict: false,
  onError: 'continue',
  summary: {
    newArtifactsDir: 'branch',
    currentArtifactsDir: 'main',
    ignoredKeys: ['description', 'documentation', 'enum', 'etag', 'revision', 'title', 'url', 'rootUrl'],
  },
};

/**
 * Schema for the config file. Every section is optional; missing values fall
 * back to {@link defaultAutocommitConfig}.
 */
export const AutocommitConfigFileSchema = z
  .object({
    identity: z
      .object({
        name: z.string().min(1),
        email: z.string().email(),
      })
      .partial(),
    paths: z
      .object({
        manifest: z.string().min(1),
        summaryDir: z.string().min(1),
        summaryExtension: z.string(),
        discoveryDir: z.string().min(1),
        discoveryPattern: z.string().includes('{name}'),
        docsDir: z.string().min(1),
        docsPattern: z.string().includes('{name}'),
      })
      .partial(),
    git: z
      .object({
        push: z.boolean(),
        pushMode: z.enum(['each', 'once']),
        remote: z.string().min(1),
      })
      .partial(),
    strict: z.boolean(),
    onError: z.enum(['continue', 'abort']),
    summary: z
      .object({
        newArtifactsDir: z.string().min(1),
        currentArtifactsDir: z.string().min(1),
        ignoredKeys: z.array(z.string().min(1)),
      })
      .partial(),
  })
  .partial()
  .strict();

export type AutocommitConfigFile = z.infer<typeof AutocommitConfigFileSchema>;

/**
 * Environment overrides, already parsed (see `parseAutocommitEnv`)
 */
export interface AutocommitEnvOverrides {
  push?: boolean;
  pushMode?: PushMode;
  remote?: string;
  strict?: boolean;
  manifest?: string;
  summaryDir?: string;
  gitName?: string;
  gitEmail?: string;
}

/**
 * Resolve config with env variable overrides
 *
 * @param fileConfig - Config from discovery-autocommit.config.json
 * @param env - Parsed environment overrides
 */
export function resolveAutocommitConfig(
  fileConfig: AutocommitConfigFile = {},
  env: AutocommitEnvOverrides = {}
): AutocommitConfig {
  const defaults = defaultAutocommitConfig;
  const config: AutocommitConfig = {
    identity: {
      name: fileConfig.identity?.name ?? defaults.identity.name,
      email: fileConfig.identity?.email ?? defaults.identity.email,
    },
    paths: { ...defaults.paths, ...fileConfig.paths },
    git: { ...defaults.git, ...fileConfig.git },
    strict: fileConfig.strict ?? defaults.strict,
    onError: fileConfig.onError ?? defaults.onError,
    summary: {
      newArtifactsDir: fileConfig.summary?.newArtifactsDir ?? defaults.summary.newArtifactsDir,
      currentArtifactsDir: fileConfig.summary?.currentArtifactsDir ?? defaults.summary.currentArtifactsDir,
      ignoredKeys: [...(fileConfig.summary?.ignoredKeys ?? defaults.summary.ignoredKeys)],
    },
  };

  // Environment variable overrides (highest priority below CLI flags)
  if (env.push !== undefined) {
    config.git.push = env.push;
  }
  if (env.pushMode !== undefined) {
    config.git.pushMode = env.pushMode;
  }
  if (env.remote) {
    config.git.remote = env.remote;
  }
  if (env.strict !== undefined) {
    config.strict = env.strict;
  }
  if (env.manifest) {
    config.paths.manifest = env.manifest;
  }
  if (env.summaryDir) {
    config.paths.summaryDir = env.summaryDir;
  }
  if (env.gitName) {
    config.identity.name = env.gitName;
  }
  if (env.gitEmail) {
    config.identity.email = env.gitEmail;
  }

  return config;
}
