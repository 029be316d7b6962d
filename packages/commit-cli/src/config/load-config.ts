/**
 * Config file loading and layering
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  AutocommitConfigFileSchema,
  parseAutocommitEnv,
  resolveAutocommitConfig,
  type AutocommitConfig,
  type AutocommitConfigFile,
} from '@discovery-autocommit/commit-contracts';
import { ConfigError, errorMessage } from '@discovery-autocommit/commit-core';

export const CONFIG_FILE_NAME = 'discovery-autocommit.config.json';

export interface LoadConfigOptions {
  cwd: string;
  /** Explicit config path; must exist when given */
  configPath?: string;
  env?: Record<string, string | undefined>;
}

/**
 * Read and validate the config file. A missing default file reads as `{}`.
 */
export async function readConfigFile(path: string, required: boolean): Promise<AutocommitConfigFile> {
  if (!existsSync(path)) {
    if (required) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${path}`, {
      cause: error,
      details: errorMessage(error),
    });
  }

  const result = AutocommitConfigFileSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid config in ${path}`, {
      details: {
        issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      },
    });
  }

  return result.data;
}

/**
 * defaults → config file → environment
 */
export async function loadConfig(options: LoadConfigOptions): Promise<AutocommitConfig> {
  const path = resolve(options.cwd, options.configPath ?? CONFIG_FILE_NAME);
  const fileConfig = await readConfigFile(path, options.configPath !== undefined);
  const env = parseAutocommitEnv(options.env ?? process.env);

  return resolveAutocommitConfig(fileConfig, env);
}
