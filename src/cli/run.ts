/**
 * One tasks-sync run: resolve configuration, sync, write back, report.
 *
 * Returns the process exit code: 1 when configuration is incomplete, the
 * board cannot be listed, or any item failed; 0 otherwise.
 */

import * as fs from 'fs';
import { defaultConfig, parseConfigFile, resolveScope, resolveToken } from '../config/parser.js';
import { createGitHubClient } from '../github/client.js';
import type { ProjectRef } from '../github/types.js';
import { executeSync } from '../sync/executor.js';
import { formatSyncSummary, toJsonReport } from '../sync/report.js';
import type { BoardClient, SyncResult, SyncScope } from '../sync/types.js';
import { parseTasksFile } from '../tasks/parser.js';
import type { TaskFile } from '../tasks/types.js';
import { removeDoneTasks, writebackIds } from '../tasks/writeback.js';
import type { NormalizedConfig } from '../types/config.js';
import { errorMessage } from '../utils/assert.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { CliOptions } from './program.js';

const DEFAULT_TASKS_FILE = 'TASKS.md';

export interface RunDependencies {
  createClient?: (token: string, project: ProjectRef) => BoardClient;
  logger?: Logger;
  /** Where the summary is printed */
  output?: NodeJS.WritableStream;
  env?: NodeJS.ProcessEnv;
}

interface ResolvedRun {
  token: string;
  project: ProjectRef;
  scope: SyncScope;
  taskFile: TaskFile;
  dryRun: boolean;
  writeback: boolean;
  removeDone: boolean;
}

function resolveRun(
  tasksFileArg: string | undefined,
  options: CliOptions,
  config: NormalizedConfig,
  env: NodeJS.ProcessEnv
): ResolvedRun {
  const token = resolveToken(options.token, config.github.token, env);
  if (!token) {
    throw new Error('GitHub token is required (--token, github.token, GITHUB_TOKEN or TASKS_SYNC_TOKEN)');
  }

  const owner = options.org ?? config.project.owner;
  if (!owner) {
    throw new Error('Project owner is required (--org or project.owner)');
  }

  const number = options.projectNumber ?? config.project.number;
  if (number === undefined) {
    throw new Error('Project number is required (--project-number or project.number)');
  }

  const scope = resolveScope(options.repo ?? config.scope.repo, options.repoLabel ?? config.scope.label);
  const taskFile = parseTasksFile(tasksFileArg ?? config.tasksFile ?? DEFAULT_TASKS_FILE);

  return {
    token,
    project: { owner, number, ownerType: options.user ? 'user' : config.project.ownerType },
    scope,
    taskFile,
    dryRun: options.dryRun ?? false,
    writeback: options.writeback ?? config.writeback,
    removeDone: options.removeDone ?? config.removeDone,
  };
}

function applyWriteback(run: ResolvedRun, result: SyncResult, logger: Logger): void {
  const path = run.taskFile.sourcePath;
  const idMap = { ...result.matchedIds, ...result.createdIds };

  if (run.dryRun) {
    logger.info(`[DRY RUN] Would write IDs back to ${path}`);
    return;
  }

  try {
    if (writebackIds(path, idMap, logger)) {
      logger.info(`Wrote IDs back to ${path}`);
    } else {
      logger.debug(`IDs in ${path} already up to date`);
    }
  } catch (error) {
    const message = `Failed to write IDs back to ${path}: ${errorMessage(error)}`;
    logger.error(message);
    result.errors.push(message);
  }
}

function applyRemoveDone(run: ResolvedRun, result: SyncResult, logger: Logger): void {
  const path = run.taskFile.sourcePath;

  if (run.dryRun) {
    logger.info(`[DRY RUN] Skipping removal of Done tasks from ${path}`);
    return;
  }
  if (result.errors.length > 0) {
    logger.warn(`Sync had errors; Done tasks kept in ${path}`);
    return;
  }

  try {
    if (removeDoneTasks(path)) {
      logger.info(`Removed Done tasks from ${path}`);
    }
  } catch (error) {
    const message = `Failed to remove Done tasks from ${path}: ${errorMessage(error)}`;
    logger.error(message);
    result.errors.push(message);
  }
}

function writeJsonReport(outputPath: string, result: SyncResult, logger: Logger): void {
  try {
    fs.writeFileSync(outputPath, `${JSON.stringify(toJsonReport(result), null, 2)}\n`, 'utf-8');
    logger.debug(`Wrote JSON summary to ${outputPath}`);
  } catch (error) {
    const message = `Failed to write JSON summary to ${outputPath}: ${errorMessage(error)}`;
    logger.error(message);
    result.errors.push(message);
  }
}

/**
 * Run a sync from command line options
 */
export async function runSync(
  tasksFileArg: string | undefined,
  options: CliOptions,
  deps: RunDependencies = {}
): Promise<number> {
  const env = deps.env ?? process.env;
  const output = deps.output ?? process.stdout;
  let logger = deps.logger;

  let config: NormalizedConfig;
  try {
    config = options.config ? parseConfigFile(options.config) : defaultConfig();
  } catch (error) {
    (logger ?? createLogger({ level: 'error' })).error(errorMessage(error));
    return 1;
  }

  logger ??= createLogger({
    level: options.verbose ? 'debug' : config.log.level,
    format: options.logFormat ?? config.log.format,
  });

  let run: ResolvedRun;
  try {
    run = resolveRun(tasksFileArg, options, config, env);
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  }

  logger.info(
    `Syncing ${run.taskFile.tasks.length} tasks from ${run.taskFile.sourcePath} to ` +
    `${run.project.ownerType} ${run.project.owner} project #${run.project.number}` +
    (run.dryRun ? ' (dry run)' : '')
  );

  const client = (deps.createClient ?? createGitHubClient)(run.token, run.project);

  let result: SyncResult;
  try {
    result = await executeSync(client, run.taskFile, {
      scope: run.scope,
      dryRun: run.dryRun,
      logger,
    });
  } catch (error) {
    logger.error(`Sync aborted: ${errorMessage(error)}`);
    return 1;
  }

  if (run.writeback) {
    applyWriteback(run, result, logger);
  }
  if (run.removeDone) {
    applyRemoveDone(run, result, logger);
  }
  if (options.outputJson) {
    writeJsonReport(options.outputJson, result, logger);
  }

  output.write(`\n${formatSyncSummary(result)}\n`);

  return result.errors.length > 0 ? 1 : 0;
}
