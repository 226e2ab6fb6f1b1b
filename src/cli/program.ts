import { Command, InvalidArgumentError, Option } from 'commander';
import { z } from 'zod';

// Options as commander hands them over, validated before use
export const CliOptionsSchema = z.object({
  config: z.string().optional(),
  token: z.string().optional(),
  org: z.string().optional(),
  projectNumber: z.number().int().positive().optional(),
  user: z.boolean().optional(),
  repo: z.string().optional(),
  repoLabel: z.string().optional(),
  dryRun: z.boolean().optional(),
  writeback: z.boolean().optional(),
  removeDone: z.boolean().optional(),
  outputJson: z.string().optional(),
  verbose: z.boolean().optional(),
  logFormat: z.enum(['text', 'json']).optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export type RunHandler = (tasksFile: string | undefined, options: CliOptions) => Promise<void>;

export function parsePositiveInt(value: string): number {
  const trimmed = value.trim();
  const parsed = Number.parseInt(trimmed, 10);
  if (!/^\d+$/.test(trimmed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Build the tasks-sync command line program
 */
export function createProgram(onRun: RunHandler): Command {
  const program = new Command();

  program
    .name('tasks-sync')
    .description('Sync a TASKS.md file to a GitHub Projects board')
    .version('0.1.0')
    .argument('[tasks-file]', 'Path to the tasks file (default: TASKS.md)')
    .option('--config <path>', 'YAML configuration file')
    .option('--token <token>', 'GitHub token (default: GITHUB_TOKEN or TASKS_SYNC_TOKEN)')
    .option('--org <login>', 'Login of the organization or user that owns the project')
    .option('--project-number <n>', 'Project number', parsePositiveInt)
    .option('--user', 'The project is owned by a user, not an organization')
    .option('--repo <owner/repo>', 'Create issues in this repository and only archive its items')
    .option('--repo-label <label>', 'Only archive items carrying this label')
    .option('--dry-run', 'Show what would change without touching the board')
    .option('--writeback', 'Write board item IDs back into the tasks file')
    .option('--remove-done', 'Remove Done tasks from the file after a clean sync')
    .option('--output-json <path>', 'Write a JSON summary for CI')
    .option('--verbose', 'Enable debug logging')
    .addOption(new Option('--log-format <format>', 'Log line format').choices(['text', 'json']))
    .action(async (tasksFile: string | undefined, opts: unknown) => {
      await onRun(tasksFile, CliOptionsSchema.parse(opts));
    });

  return program;
}
