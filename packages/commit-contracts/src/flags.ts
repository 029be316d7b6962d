/**
 * Declarative flag definitions for the autocommit commands
 *
 * Defined once here; the CLI registers them on its commander commands.
 * The `*Flags` types describe the parsed values, whose keys commander
 * camel-cases (`--dry-run` → `dryRun`).
 */

export interface FlagDefinition {
  type: 'string' | 'boolean';
  description: string;
  alias?: string;
  /** Placeholder shown in help for string flags */
  valueName?: string;
}

export type FlagSet = Record<string, FlagDefinition>;

/**
 * Flags for the commit command
 *
 * @example
 * ```bash
 * discovery-autocommit commit --manifest changed_files --push
 * ```
 */
export const commitFlags = {
  manifest: {
    type: 'string',
    description: 'Manifest of changed API identifiers',
    alias: 'm',
    valueName: 'path',
  },
  push: {
    type: 'boolean',
    description: 'Push commits to the remote',
  },
  'push-mode': {
    type: 'string',
    description: 'When to push: each (after every commit) or once (after the batch)',
    valueName: 'mode',
  },
  strict: {
    type: 'boolean',
    description: 'Fail an API whose summary file is missing instead of skipping it',
  },
  'abort-on-error': {
    type: 'boolean',
    description: 'Stop at the first failing API',
  },
  'dry-run': {
    type: 'boolean',
    description: 'Report what would be committed without touching git',
  },
  json: {
    type: 'boolean',
    description: 'Output result as JSON instead of formatted text',
  },
} as const satisfies FlagSet;

export type CommitFlags = {
  manifest?: string;
  push?: boolean;
  pushMode?: string;
  strict?: boolean;
  abortOnError?: boolean;
  dryRun?: boolean;
  json?: boolean;
};

/**
 * Flags for the summarize command
 *
 * @example
 * ```bash
 * discovery-autocommit summarize --new-dir branch --current-dir main
 * ```
 */
export const summarizeFlags = {
  manifest: {
    type: 'string',
    description: 'List of changed discovery files (defaults to <new-dir>/changed_files)',
    alias: 'm',
    valueName: 'path',
  },
  'new-dir': {
    type: 'string',
    description: 'Directory with the new discovery documents',
    valueName: 'dir',
  },
  'current-dir': {
    type: 'string',
    description: 'Directory with the current discovery documents',
    valueName: 'dir',
  },
  'out-dir': {
    type: 'string',
    description: 'Where to write <name>.verbose summary files',
    valueName: 'dir',
  },
  json: {
    type: 'boolean',
    description: 'Output summaries as JSON instead of formatted text',
  },
} as const satisfies FlagSet;

export type SummarizeFlags = {
  manifest?: string;
  newDir?: string;
  currentDir?: string;
  outDir?: string;
  json?: boolean;
};

/**
 * Flags for the push command
 */
export const pushFlags = {
  remote: {
    type: 'string',
    description: 'Remote to push to',
    alias: 'r',
    valueName: 'name',
  },
  json: {
    type: 'boolean',
    description: 'Output JSON',
  },
} as const satisfies FlagSet;

export type PushFlags = {
  remote?: string;
  json?: boolean;
};
