import { z } from 'zod';

// ============================================================================
// Manifest
// ============================================================================

/**
 * One manifest line reduced to the API it names
 */
export const ManifestEntrySchema = z.object({
  /** Raw identifier as written in the manifest (e.g. `drive.v3`) */
  identifier: z.string().min(1),
  /** API name, the part before the first dot (e.g. `drive`) */
  name: z.string().min(1),
});

export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;

// ============================================================================
// Commit Outcomes
// ============================================================================

export const CommitStatusSchema = z.enum(['committed', 'planned', 'skipped', 'unchanged', 'failed']);

export type CommitStatus = z.infer<typeof CommitStatusSchema>;

/**
 * What happened to a single API during a run
 */
export const CommitOutcomeSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('committed'),
    api: z.string(),
    sha: z.string(),
    message: z.string(),
    paths: z.array(z.string()).min(1),
    pushed: z.boolean(),
    pushError: z.string().optional(),
  }),
  /** Dry run: what would have been committed */
  z.object({
    status: z.literal('planned'),
    api: z.string(),
    message: z.string(),
    paths: z.array(z.string()).min(1),
  }),
  z.object({
    status: z.literal('skipped'),
    api: z.string(),
    summaryPath: z.string(),
  }),
  z.object({
    status: z.literal('unchanged'),
    api: z.string(),
    patterns: z.array(z.string()),
  }),
  z.object({
    status: z.literal('failed'),
    api: z.string(),
    error: z.string(),
  }),
]);

export type CommitOutcome = z.infer<typeof CommitOutcomeSchema>;

export const PushResultSchema = z.object({
  success: z.boolean(),
  remote: z.string(),
  branch: z.string(),
  commitsPushed: z.number().int().min(0),
  error: z.string().optional(),
});

export type PushResult = z.infer<typeof PushResultSchema>;

/**
 * Result of one orchestrator run
 */
export const RunReportSchema = z.object({
  manifestPath: z.string(),
  outcomes: z.array(CommitOutcomeSchema),
  counts: z.object({
    committed: z.number().int().min(0),
    planned: z.number().int().min(0),
    skipped: z.number().int().min(0),
    unchanged: z.number().int().min(0),
    failed: z.number().int().min(0),
  }),
  /** Set when the batch stopped early under `onError: "abort"` */
  aborted: z.boolean(),
  push: PushResultSchema.optional(),
});

export type RunReport = z.infer<typeof RunReportSchema>;

// ============================================================================
// Discovery Change Summary
// ============================================================================

/**
 * Ordering matters: changes sort deleted → added → changed
 */
export const ChangeTypeSchema = z.enum(['deleted', 'added', 'changed']);

export type ChangeType = z.infer<typeof ChangeTypeSchema>;

export const CHANGE_TYPE_ORDER: Record<ChangeType, number> = {
  deleted: 1,
  added: 2,
  changed: 3,
};

export const DiscoveryChangeSchema = z.object({
  name: z.string(),
  version: z.string(),
  key: z.string(),
  changeType: ChangeTypeSchema,
});

export type DiscoveryChange = z.infer<typeof DiscoveryChangeSchema>;

export const ApiChangeSummarySchema = z.object({
  name: z.string(),
  isFeature: z.boolean(),
  isBreaking: z.boolean(),
  /** Conventional-commit subject line */
  summary: z.string(),
  /** Key listing grouped by version and change type */
  verbose: z.string(),
  changes: z.array(DiscoveryChangeSchema),
});

export type ApiChangeSummary = z.infer<typeof ApiChangeSummarySchema>;

// ============================================================================
// Command Outputs
// ============================================================================

// --- summarize ---
export const SummarizeOutputSchema = z.object({
  apis: z.array(ApiChangeSummarySchema),
  written: z.array(z.string()),
});

export type SummarizeOutput = z.infer<typeof SummarizeOutputSchema>;

// --- push ---
export const PushOutputSchema = z.object({
  success: z.boolean(),
  remote: z.string(),
  branch: z.string(),
  commits: z.number().int().min(0),
  error: z.string().optional(),
});

export type PushOutput = z.infer<typeof PushOutputSchema>;
