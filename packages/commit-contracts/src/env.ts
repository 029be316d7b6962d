/**
 * Environment variable definitions for discovery autocommit
 */

import { z } from 'zod';
import type { AutocommitEnvOverrides } from './types/config';

export const AUTOCOMMIT_ENV_VARS = [
  'AUTOCOMMIT_PUSH',
  'AUTOCOMMIT_PUSH_MODE',
  'AUTOCOMMIT_REMOTE',
  'AUTOCOMMIT_STRICT',
  'AUTOCOMMIT_MANIFEST',
  'AUTOCOMMIT_SUMMARY_DIR',
  'AUTOCOMMIT_GIT_NAME',
  'AUTOCOMMIT_GIT_EMAIL',
] as const;

export type AutocommitEnvVar = (typeof AUTOCOMMIT_ENV_VARS)[number];

// Unparseable values become undefined so the lower config layers win
const booleanVar = z
  .enum(['true', 'false'])
  .transform((v) => v === 'true')
  .optional()
  .catch(undefined);

const stringVar = z.string().trim().min(1).optional().catch(undefined);

export const autocommitEnvSchema = z.object({
  AUTOCOMMIT_PUSH: booleanVar,
  AUTOCOMMIT_PUSH_MODE: z.enum(['each', 'once']).optional().catch(undefined),
  AUTOCOMMIT_REMOTE: stringVar,
  AUTOCOMMIT_STRICT: booleanVar,
  AUTOCOMMIT_MANIFEST: stringVar,
  AUTOCOMMIT_SUMMARY_DIR: stringVar,
  AUTOCOMMIT_GIT_NAME: stringVar,
  AUTOCOMMIT_GIT_EMAIL: z.string().email().optional().catch(undefined),
});

export type AutocommitEnv = z.infer<typeof autocommitEnvSchema>;

/**
 * Parse environment variables into config overrides
 *
 * @example
 * const overrides = parseAutocommitEnv(process.env);
 */
export function parseAutocommitEnv(env: Record<string, string | undefined>): AutocommitEnvOverrides {
  const parsed = autocommitEnvSchema.parse(env);

  return {
    push: parsed.AUTOCOMMIT_PUSH,
    pushMode: parsed.AUTOCOMMIT_PUSH_MODE,
    remote: parsed.AUTOCOMMIT_REMOTE,
    strict: parsed.AUTOCOMMIT_STRICT,
    manifest: parsed.AUTOCOMMIT_MANIFEST,
    summaryDir: parsed.AUTOCOMMIT_SUMMARY_DIR,
    gitName: parsed.AUTOCOMMIT_GIT_NAME,
    gitEmail: parsed.AUTOCOMMIT_GIT_EMAIL,
  };
}
