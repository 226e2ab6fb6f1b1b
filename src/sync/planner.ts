/**
 * Reconciliation engine
 *
 * Maps the desired task list onto the observed board items and decides, for
 * every task and every item, which bucket of the sync plan it belongs to.
 * Planning is pure: the only mutation is attaching a resolved `remoteId` to
 * tasks matched by title.
 */

import type { BoardItem, RepositoryRef } from '../github/types.js';
import type { Task } from '../tasks/types.js';
import { assertNever } from '../utils/assert.js';
import type { ChangeKind, SyncPlan, SyncResult, SyncScope } from './types.js';

/**
 * Compare two label lists as sets of case-sensitive names
 */
export function sameLabelSet(a: readonly string[], b: readonly string[]): boolean {
  const left = [...a].sort();
  const right = [...b].sort();
  return left.length === right.length && left.every((label, index) => label === right[index]);
}

export function sameRepository(a: RepositoryRef, b: RepositoryRef): boolean {
  return a.owner === b.owner && a.name === b.name;
}

/**
 * List the fields on which a task differs from its matched item, in
 * evaluation order
 *
 * Assignee and labels are only compared for Issue content: drafts and pull
 * requests have no mutation path for them, so a difference there could never
 * converge.
 */
export function diffTask(task: Task, item: BoardItem): ChangeKind[] {
  const changes: ChangeKind[] = [];

  if (task.title !== item.title) {
    changes.push('title');
  }
  if (task.status && task.status.toLowerCase() !== item.status.toLowerCase()) {
    changes.push('status');
  }
  if (task.description.trim() !== item.description.trim()) {
    changes.push('description');
  }
  if (task.dueDate && task.dueDate !== item.dueDate) {
    changes.push('dueDate');
  }

  switch (item.content.kind) {
    case 'issue':
      if (task.assignee && task.assignee !== item.assignee) {
        changes.push('assignee');
      }
      if (task.labels.length > 0 && !sameLabelSet(task.labels, item.labels)) {
        changes.push('labels');
      }
      break;
    case 'draft':
    case 'pullRequest':
    case 'none':
      break;
    default:
      assertNever(item.content, 'Unknown content kind');
  }

  return changes;
}

/**
 * Whether a matched task/item pair needs an update
 */
export function needsUpdate(task: Task, item: BoardItem): boolean {
  return diffTask(task, item).length > 0;
}

/**
 * Whether an unclaimed item falls inside the run's archive scope
 */
export function isInArchiveScope(item: BoardItem, scope: SyncScope = {}): boolean {
  if (scope.repository) {
    return (
      item.content.kind === 'issue' &&
      item.content.repository !== null &&
      sameRepository(item.content.repository, scope.repository)
    );
  }
  if (scope.label) {
    return item.labels.includes(scope.label);
  }
  return true;
}

/**
 * Claim bookkeeping for one planning pass
 */
class ItemIndex {
  private readonly byId = new Map<string, BoardItem>();
  private readonly byTitle = new Map<string, BoardItem[]>();
  private readonly claimed = new Set<string>();

  constructor(items: readonly BoardItem[]) {
    for (const item of items) {
      if (!this.byId.has(item.id)) {
        this.byId.set(item.id, item);
      }
      if (item.title) {
        const sameTitle = this.byTitle.get(item.title) ?? [];
        sameTitle.push(item);
        this.byTitle.set(item.title, sameTitle);
      }
    }
  }

  get(id: string): BoardItem | undefined {
    return this.byId.get(id);
  }

  isClaimed(id: string): boolean {
    return this.claimed.has(id);
  }

  claim(item: BoardItem): void {
    this.claimed.add(item.id);
  }

  /**
   * First unclaimed item with exactly this title, in listing order
   */
  matchTitle(title: string): { item: BoardItem; candidates: number } | undefined {
    const candidates = (this.byTitle.get(title) ?? []).filter((item) => !this.claimed.has(item.id));
    if (candidates.length === 0) {
      return undefined;
    }
    return { item: candidates[0], candidates: candidates.length };
  }
}

/**
 * Compare the task list to the board and produce a sync plan
 *
 * @param tasks - Desired tasks in file order; earlier tasks win contested items
 * @param items - Every listed board item
 * @param scope - Archive scope; a repository scope also routes drafts to conversion
 */
export function buildSyncPlan(
  tasks: readonly Task[],
  items: readonly BoardItem[],
  scope: SyncScope = {}
): SyncPlan {
  const plan: SyncPlan = {
    tasks: [...tasks],
    create: [],
    update: [],
    unarchive: [],
    archive: [],
    unchanged: [],
    titleMatched: new Set(),
    warnings: [],
  };
  const index = new ItemIndex(items);
  const unarchiveIds = new Set<string>();

  const route = (task: Task, item: BoardItem, extra: ChangeKind[] = []): void => {
    const changes = [...extra, ...diffTask(task, item)];
    if (scope.repository && item.content.kind === 'draft') {
      changes.push('convert');
    }
    if (changes.length > 0) {
      plan.update.push({ task, item, changes });
    } else {
      plan.unchanged.push({ task, item });
    }
  };

  const fallBackToTitle = (task: Task): BoardItem | undefined => {
    const match = index.matchTitle(task.title);
    if (!match) {
      return undefined;
    }
    if (match.candidates > 1) {
      plan.warnings.push(
        `Task '${task.title}' matched one of ${match.candidates} board items with the same title; using ${match.item.id}`
      );
    }
    index.claim(match.item);
    plan.titleMatched.add(task.title);
    task.remoteId = match.item.id;
    return match.item;
  };

  for (const task of tasks) {
    const remoteId = task.remoteId;
    if (remoteId) {
      const item = index.get(remoteId);

      if (item && !index.isClaimed(item.id)) {
        index.claim(item);
        route(task, item);
        continue;
      }

      if (item) {
        // Another task earlier in the file already holds this identifier
        plan.warnings.push(`Task '${task.title}' shares ID ${remoteId} with an earlier task`);
      }

      const matched = fallBackToTitle(task);
      if (matched) {
        route(task, matched, ['identifier']);
      } else if (item || unarchiveIds.has(remoteId)) {
        plan.create.push(task);
      } else {
        unarchiveIds.add(remoteId);
        plan.unarchive.push(task);
      }
      continue;
    }

    const matched = fallBackToTitle(task);
    if (matched) {
      route(task, matched);
    } else {
      plan.create.push(task);
    }
  }

  for (const item of items) {
    if (!index.isClaimed(item.id) && isInArchiveScope(item, scope)) {
      index.claim(item);
      plan.archive.push(item);
    }
  }

  return plan;
}

/**
 * Title -> item ID maps for writeback, built in file order.
 *
 * Writeback marks only the first heading with a given title, so a duplicated
 * title maps to its earliest task, whether that task was matched or created.
 * Later twins stay unmarked and pair with their remaining item by title on the
 * next run. Draft conversions count as created.
 */
export function collectTaskIds(
  plan: SyncPlan,
  createdItems: ReadonlyMap<Task, string> = new Map()
): Pick<SyncResult, 'createdIds' | 'matchedIds'> {
  const matchedItems = new Map<Task, string>();
  for (const { task, item } of plan.unchanged) {
    matchedItems.set(task, item.id);
  }
  for (const { task, item, changes } of plan.update) {
    if (!changes.includes('convert')) {
      matchedItems.set(task, item.id);
    }
  }

  const createdIds: Record<string, string> = {};
  const matchedIds: Record<string, string> = {};
  const seen = new Set<string>();
  for (const task of plan.tasks) {
    if (seen.has(task.title)) {
      continue;
    }
    seen.add(task.title);

    const created = createdItems.get(task);
    const matched = matchedItems.get(task);
    if (created) {
      createdIds[task.title] = created;
    } else if (matched) {
      matchedIds[task.title] = matched;
    }
  }
  return { createdIds, matchedIds };
}
