import { z } from 'zod';

// Zod schema for the GitHub credentials section
export const GitHubConfigSchema = z.object({
  token: z.string().min(1, 'Token must not be empty').optional(),
}).partial();

// Zod schema for the target project; flags may fill in what is missing
export const ProjectConfigSchema = z.object({
  owner: z.string().min(1, 'Project owner is required').optional(),
  number: z.number().int().positive('Project number must be a positive integer').optional(),
  type: z.enum(['org', 'user']).default('org'),
});

// Zod schema for the archive/issue scope
export const ScopeConfigSchema = z.object({
  repo: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'Repo must be in format "owner/repo"').optional(),
  label: z.string().min(1, 'Scope label must not be empty').optional(),
});

// Zod schema for logging
export const LogConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  format: z.enum(['text', 'json']).default('text'),
});

// Complete configuration schema
export const ConfigSchema = z.object({
  github: GitHubConfigSchema.optional(),
  project: ProjectConfigSchema.optional(),
  scope: ScopeConfigSchema.optional(),
  tasks_file: z.string().min(1).optional(),
  writeback: z.boolean().default(false),
  remove_done: z.boolean().default(false),
  log: LogConfigSchema.optional(),
});

// TypeScript types derived from Zod schemas
export type GitHubConfig = z.infer<typeof GitHubConfigSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type ScopeConfig = z.infer<typeof ScopeConfigSchema>;
export type LogConfig = z.infer<typeof LogConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

// Normalized complete config, camelCase and with defaults applied
export interface NormalizedConfig {
  github: {
    token: string | undefined;
  };
  project: {
    owner: string | undefined;
    number: number | undefined;
    ownerType: 'org' | 'user';
  };
  scope: {
    repo: string | undefined;
    label: string | undefined;
  };
  tasksFile: string | undefined;
  writeback: boolean;
  removeDone: boolean;
  log: LogConfig;
}
