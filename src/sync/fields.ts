/**
 * Field application: pushes a task's status, due date, assignee and labels
 * onto one board item. Unresolvable references degrade to warnings.
 */

import {
  DUE_DATE_FIELD_NAMES,
  STATUS_FIELD_NAME,
  type BoardItem,
  type ProjectFieldInfo,
  type ProjectFields,
  type RepositoryRef,
} from '../github/types.js';
import type { Task } from '../tasks/types.js';
import { assertNever } from '../utils/assert.js';
import { noopLogger, type Logger } from '../utils/logger.js';
import { sameLabelSet } from './planner.js';
import type { BoardClient, SyncScope } from './types.js';

export interface ApplyFieldsOptions {
  scope?: SyncScope;
  logger?: Logger;
}

/**
 * Match a task status to a board option: exact name first, then
 * case-insensitive
 */
export function matchStatusOption(status: string, options: ReadonlyMap<string, string>): string | undefined {
  const exact = options.get(status);
  if (exact) {
    return exact;
  }

  const lowered = status.toLowerCase();
  for (const [name, optionId] of options) {
    if (name.toLowerCase() === lowered) {
      return optionId;
    }
  }

  return undefined;
}

/**
 * The date field the due date is written to, if the board has one
 */
export function findDueDateField(fields: ProjectFields): ProjectFieldInfo | undefined {
  for (const name of DUE_DATE_FIELD_NAMES) {
    const field = fields.get(name);
    if (field && field.dataType === 'DATE') {
      return field;
    }
  }
  return undefined;
}

/**
 * Apply a task's field values to a board item
 *
 * Status and due date go through project fields. Assignee and labels are set
 * on the underlying issue and only when the item wraps one.
 *
 * @returns Warnings for values that could not be applied
 */
export async function applyTaskFields(
  client: BoardClient,
  item: BoardItem,
  task: Task,
  fields: ProjectFields,
  options: ApplyFieldsOptions = {}
): Promise<string[]> {
  const logger = options.logger ?? noopLogger;
  const warnings: string[] = [];
  const warn = (message: string): void => {
    warnings.push(message);
    logger.warn(message);
  };

  if (task.status) {
    const statusField = fields.get(STATUS_FIELD_NAME);
    const optionId = statusField ? matchStatusOption(task.status, statusField.options) : undefined;

    if (statusField && optionId) {
      await client.updateItemField(item.id, statusField.id, { kind: 'singleSelect', optionId });
    } else if (statusField) {
      warn(
        `Status '${task.status}' for '${task.title}' not found in project options: ` +
        `${Array.from(statusField.options.keys()).join(', ')}`
      );
    } else {
      warn(`Project has no ${STATUS_FIELD_NAME} field; status of '${task.title}' not applied`);
    }
  }

  if (task.dueDate) {
    const dueField = findDueDateField(fields);
    if (dueField) {
      await client.updateItemField(item.id, dueField.id, { kind: 'date', date: task.dueDate });
    } else {
      logger.debug(`No due date field on the project; skipping due date of '${task.title}'`);
    }
  }

  const content = item.content;
  switch (content.kind) {
    case 'issue':
      await applyIssueFields(client, content.id, content.repository ?? options.scope?.repository, item, task, warn);
      break;
    case 'draft':
    case 'pullRequest':
    case 'none':
      break;
    default:
      assertNever(content, 'Unknown content kind');
  }

  return warnings;
}

async function applyIssueFields(
  client: BoardClient,
  issueId: string,
  repository: RepositoryRef | undefined,
  item: BoardItem,
  task: Task,
  warn: (message: string) => void
): Promise<void> {
  if (task.assignee && task.assignee !== item.assignee) {
    const userId = await client.resolveUserId(task.assignee);
    if (userId) {
      await client.setIssueAssignees(issueId, [userId]);
    } else {
      warn(`Could not resolve assignee '${task.assignee}' for '${task.title}'`);
    }
  }

  if (task.labels.length > 0 && !sameLabelSet(task.labels, item.labels)) {
    if (!repository) {
      warn(`No repository known for '${task.title}'; labels not applied`);
      return;
    }

    const labelIds = await client.resolveLabelIds(repository, task.labels);
    if (labelIds.length > 0) {
      await client.setIssueLabels(issueId, labelIds);
    } else {
      warn(
        `None of the labels ${task.labels.join(', ')} for '${task.title}' exist in ` +
        `${repository.owner}/${repository.name}`
      );
    }
  }
}
