/**
 * Plan executor: walks a sync plan and issues the remote mutations, one at a
 * time, in the order unarchive, create, update, archive.
 *
 * Each task or item is independent. A failure becomes one error message in
 * the result and execution moves on; only the initial listing and field
 * lookup escape to the caller.
 */

import type { BoardItem, ProjectFields, RepositoryRef } from '../github/types.js';
import type { Task, TaskFile } from '../tasks/types.js';
import { assertNever, errorMessage } from '../utils/assert.js';
import { noopLogger, type Logger } from '../utils/logger.js';
import { applyTaskFields } from './fields.js';
import { buildSyncPlan, collectTaskIds } from './planner.js';
import { describePlan, formatPlanSummary } from './report.js';
import {
  createEmptyResult,
  type BoardClient,
  type ExecuteOptions,
  type PlannedUpdate,
  type SyncPlan,
  type SyncResult,
  type SyncScope,
} from './types.js';

interface RunContext {
  client: BoardClient;
  fields: ProjectFields;
  scope: SyncScope;
  logger: Logger;
  result: SyncResult;
  /** Items created so far, recorded as soon as they exist */
  createdItems: Map<Task, string>;
}

/**
 * Board item as it exists right after creation
 */
function freshItem(itemId: string, task: Task, content: BoardItem['content']): BoardItem {
  return {
    id: itemId,
    content,
    title: task.title,
    status: '',
    assignee: null,
    labels: [],
    dueDate: null,
    description: task.description,
  };
}

async function applyFields(ctx: RunContext, item: BoardItem, task: Task): Promise<void> {
  const warnings = await applyTaskFields(ctx.client, item, task, ctx.fields, {
    scope: ctx.scope,
    logger: ctx.logger,
  });
  ctx.result.warnings.push(...warnings);
}

async function runStep(ctx: RunContext, verb: string, title: string, step: () => Promise<void>): Promise<void> {
  try {
    await step();
  } catch (error) {
    const message = `Failed to ${verb} '${title}': ${errorMessage(error)}`;
    ctx.logger.error(message);
    ctx.result.errors.push(message);
  }
}

async function unarchiveTask(ctx: RunContext, task: Task, itemId: string): Promise<void> {
  const { client, logger } = ctx;

  await client.unarchiveItem(itemId);
  const item = (await client.getItem(itemId)) ?? freshItem(itemId, task, { kind: 'none' });

  if (item.content.kind === 'issue') {
    try {
      await client.reopenIssue(item.content.id);
    } catch (error) {
      const message = `Unarchived '${task.title}' but could not reopen its issue: ${errorMessage(error)}`;
      logger.warn(message);
      ctx.result.warnings.push(message);
    }
  }

  await applyFields(ctx, item, task);
  logger.info(`Unarchived board item '${task.title}' (${itemId})`);
  ctx.result.unarchived++;
}

async function createIssueItem(ctx: RunContext, task: Task, repository: RepositoryRef): Promise<BoardItem> {
  const issueId = await ctx.client.createIssue(repository, task.title, task.description);
  const itemId = await ctx.client.addItemToProject(issueId);
  ctx.createdItems.set(task, itemId);
  return freshItem(itemId, task, { kind: 'issue', id: issueId, repository, state: 'OPEN' });
}

async function createTask(ctx: RunContext, task: Task): Promise<void> {
  const repository = ctx.scope.repository;
  let item: BoardItem;

  if (repository) {
    item = await createIssueItem(ctx, task, repository);
  } else {
    const itemId = await ctx.client.createDraftItem(task.title, task.description);
    ctx.createdItems.set(task, itemId);
    // The draft's own node ID is not returned; fields only need the item ID
    item = freshItem(itemId, task, { kind: 'none' });
  }

  await applyFields(ctx, item, task);
  ctx.logger.info(`Created board item '${task.title}' -> ${item.id}`);
  ctx.result.created++;
}

async function convertDraft(ctx: RunContext, task: Task, draft: BoardItem, repository: RepositoryRef): Promise<void> {
  const item = await createIssueItem(ctx, task, repository);
  await ctx.client.archiveItem(draft.id);
  await applyFields(ctx, item, task);
  ctx.logger.info(
    `Converted draft '${task.title}' (${draft.id}) to an issue in ${repository.owner}/${repository.name} -> ${item.id}`
  );
}

async function updateContent(ctx: RunContext, item: BoardItem, task: Task): Promise<void> {
  const content = item.content;
  switch (content.kind) {
    case 'draft':
      await ctx.client.updateDraftIssue(content.id, task.title, task.description);
      break;
    case 'issue':
      await ctx.client.updateIssue(content.id, task.title, task.description);
      break;
    case 'pullRequest':
    case 'none':
      ctx.logger.debug(`Title/description of '${task.title}' not updated: ${content.kind} content`);
      break;
    default:
      assertNever(content, 'Unknown content kind');
  }
}

async function updateTask(ctx: RunContext, update: PlannedUpdate): Promise<void> {
  const { task, item, changes } = update;
  const repository = ctx.scope.repository;

  if (repository && item.content.kind === 'draft') {
    await convertDraft(ctx, task, item, repository);
  } else {
    await applyFields(ctx, item, task);
    if (changes.includes('title') || changes.includes('description')) {
      await updateContent(ctx, item, task);
    }
    ctx.logger.info(`Updated board item '${task.title}' (${item.id}) [${changes.join(', ')}]`);
  }

  ctx.result.updated++;
}

async function archiveItem(ctx: RunContext, item: BoardItem): Promise<void> {
  await ctx.client.archiveItem(item.id);
  ctx.logger.info(`Archived board item '${item.title}' (${item.id})`);
  ctx.result.archived++;
}

/**
 * Execute a sync plan against the board
 *
 * In dry-run mode nothing is mutated and the counts are the plan's bucket
 * sizes.
 */
export async function executePlan(
  client: BoardClient,
  plan: SyncPlan,
  options: ExecuteOptions = {}
): Promise<SyncResult> {
  const scope = options.scope ?? {};
  const logger = options.logger ?? noopLogger;
  const dryRun = options.dryRun ?? false;
  const result = createEmptyResult(dryRun);

  result.warnings.push(...plan.warnings);
  result.matchedIds = collectTaskIds(plan).matchedIds;
  result.unchanged = plan.unchanged.length;

  if (dryRun) {
    for (const line of describePlan(plan, scope)) {
      logger.info(`[DRY RUN] ${line}`);
    }
    result.created = plan.create.length;
    result.updated = plan.update.length;
    result.archived = plan.archive.length;
    result.unarchived = plan.unarchive.length;
    return result;
  }

  const needsFields = plan.unarchive.length + plan.create.length + plan.update.length > 0;
  const fields: ProjectFields = needsFields ? await client.getFields() : new Map();
  const createdItems = new Map<Task, string>();
  const ctx: RunContext = { client, fields, scope, logger, result, createdItems };

  for (const task of plan.unarchive) {
    const itemId = task.remoteId;
    if (!itemId) {
      result.errors.push(`Failed to unarchive '${task.title}': task has no ID`);
      continue;
    }
    await runStep(ctx, 'unarchive', task.title, () => unarchiveTask(ctx, task, itemId));
  }

  for (const task of plan.create) {
    await runStep(ctx, 'create', task.title, () => createTask(ctx, task));
  }

  for (const update of plan.update) {
    await runStep(ctx, 'update', update.task.title, () => updateTask(ctx, update));
  }

  for (const item of plan.archive) {
    await runStep(ctx, 'archive', item.title || item.id, () => archiveItem(ctx, item));
  }

  const ids = collectTaskIds(plan, createdItems);
  result.createdIds = ids.createdIds;
  result.matchedIds = ids.matchedIds;
  return result;
}

/**
 * Run a full sync from a parsed TASKS.md to the board
 *
 * Listing failures are thrown: without the board state there is no plan.
 */
export async function executeSync(
  client: BoardClient,
  taskFile: TaskFile,
  options: ExecuteOptions = {}
): Promise<SyncResult> {
  const logger = options.logger ?? noopLogger;

  logger.info('Fetching current board state...');
  const items = await client.listItems();
  logger.info(`Found ${items.length} items on the board`);

  const plan = buildSyncPlan(taskFile.tasks, items, options.scope);
  logger.info(formatPlanSummary(plan));
  for (const warning of plan.warnings) {
    logger.warn(warning);
  }

  return executePlan(client, plan, options);
}
