import * as yaml from 'js-yaml';
import * as fs from 'fs';
import * as path from 'path';
import type { RepositoryRef } from '../github/types.js';
import type { SyncScope } from '../sync/types.js';
import { ConfigSchema, type Config, type NormalizedConfig } from '../types/config.js';

// Environment variables consulted for the token, in order
export const TOKEN_ENV_VARS = ['GITHUB_TOKEN', 'TASKS_SYNC_TOKEN'] as const;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse and validate YAML configuration string
 */
export function parseConfigString(yamlContent: string): NormalizedConfig {
  let rawConfig: unknown;
  try {
    rawConfig = yaml.load(yamlContent);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Configuration is not valid YAML: ${reason}`);
  }

  // An empty document is an empty configuration
  if (rawConfig === undefined || rawConfig === null) {
    rawConfig = {};
  }

  if (typeof rawConfig !== 'object' || Array.isArray(rawConfig)) {
    throw new ConfigError('Configuration must be a valid YAML object');
  }

  const validationResult = ConfigSchema.safeParse(rawConfig);

  if (!validationResult.success) {
    const issues = validationResult.error.issues;
    const errors = issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Configuration validation failed:\n${errors}`);
  }

  return normalizeConfig(validationResult.data);
}

/**
 * Parse configuration from a file path
 */
export function parseConfigFile(filePath: string): NormalizedConfig {
  const absolutePath = path.resolve(filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Configuration file not found: ${absolutePath}`);
  }

  const content = fs.readFileSync(absolutePath, 'utf-8');
  return parseConfigString(content);
}

/**
 * Configuration used when no file is given
 */
export function defaultConfig(): NormalizedConfig {
  return parseConfigString('{}');
}

/**
 * Normalize validated config to consistent format
 */
function normalizeConfig(config: Config): NormalizedConfig {
  return {
    github: {
      token: config.github?.token,
    },
    project: {
      owner: config.project?.owner,
      number: config.project?.number,
      ownerType: config.project?.type ?? 'org',
    },
    scope: {
      repo: config.scope?.repo,
      label: config.scope?.label,
    },
    tasksFile: config.tasks_file,
    writeback: config.writeback,
    removeDone: config.remove_done,
    log: {
      level: config.log?.level ?? 'info',
      format: config.log?.format ?? 'text',
    },
  };
}

/**
 * First non-empty token from the explicit value, the config, then the
 * environment
 */
export function resolveToken(
  explicit: string | undefined,
  configToken: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  if (explicit) {
    return explicit;
  }
  if (configToken) {
    return configToken;
  }
  for (const name of TOKEN_ENV_VARS) {
    const value = env[name];
    if (value) {
      return value;
    }
  }
  return undefined;
}

/**
 * Parse an "owner/name" repository reference
 */
export function parseRepo(value: string): RepositoryRef {
  const match = value.trim().match(/^([^/\s]+)\/([^/\s]+)$/);
  if (!match) {
    throw new ConfigError(`Repo must be in format "owner/repo", got "${value}"`);
  }
  return { owner: match[1], name: match[2] };
}

/**
 * Build the sync scope from a repository string and a label
 */
export function resolveScope(repo: string | undefined, label: string | undefined): SyncScope {
  const scope: SyncScope = {};
  if (repo) {
    scope.repository = parseRepo(repo);
  }
  if (label) {
    scope.label = label;
  }
  return scope;
}
