/**
 * Types for planning and executing a TASKS.md -> project board sync
 */

import type {
  BoardItem,
  FieldValue,
  ProjectFields,
  RepositoryRef,
} from '../github/types.js';
import type { Task } from '../tasks/types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Remote operations the executor needs from a project board.
 * GitHubClient implements this against the GraphQL API.
 */
export interface BoardClient {
  /** All non-archived items on the board, every page */
  listItems(): Promise<BoardItem[]>;
  /** One item by ID, archived or not; null when it does not exist */
  getItem(itemId: string): Promise<BoardItem | null>;
  getFields(): Promise<ProjectFields>;
  /** Returns the new project item ID */
  createDraftItem(title: string, body: string): Promise<string>;
  /** Returns the new issue's node ID */
  createIssue(repository: RepositoryRef, title: string, body: string): Promise<string>;
  /** Attach an issue or PR to the board; returns the project item ID */
  addItemToProject(contentId: string): Promise<string>;
  updateItemField(itemId: string, fieldId: string, value: FieldValue): Promise<void>;
  updateDraftIssue(draftIssueId: string, title: string, body: string): Promise<void>;
  updateIssue(issueId: string, title: string, body: string): Promise<void>;
  setIssueAssignees(issueId: string, userIds: string[]): Promise<void>;
  setIssueLabels(issueId: string, labelIds: string[]): Promise<void>;
  resolveUserId(login: string): Promise<string | null>;
  /** Label IDs for the names that exist in the repository */
  resolveLabelIds(repository: RepositoryRef, names: string[]): Promise<string[]>;
  archiveItem(itemId: string): Promise<void>;
  unarchiveItem(itemId: string): Promise<void>;
  reopenIssue(issueId: string): Promise<void>;
}

/**
 * Bounds which unmatched board items may be archived. A repository scope also
 * makes new tasks real issues and converts matched drafts.
 */
export interface SyncScope {
  repository?: RepositoryRef;
  label?: string;
}

/**
 * Why a matched pair needs an update. `convert` marks a draft that will be
 * turned into an issue.
 */
export type ChangeKind =
  | 'title'
  | 'status'
  | 'description'
  | 'dueDate'
  | 'assignee'
  | 'labels'
  | 'identifier'
  | 'convert';

export interface MatchedPair {
  task: Task;
  item: BoardItem;
}

export interface PlannedUpdate extends MatchedPair {
  changes: ChangeKind[];
}

/**
 * What a sync will do, computed without remote side effects
 */
export interface SyncPlan {
  /** Every task, in file order */
  tasks: Task[];
  create: Task[];
  update: PlannedUpdate[];
  /** Tasks whose identifier is no longer listed; assumed archived */
  unarchive: Task[];
  archive: BoardItem[];
  unchanged: MatchedPair[];
  /** Titles of tasks resolved through title fallback */
  titleMatched: Set<string>;
  warnings: string[];
}

/**
 * Summary of what the sync actually did
 */
export interface SyncResult {
  created: number;
  updated: number;
  archived: number;
  unarchived: number;
  unchanged: number;
  errors: string[];
  warnings: string[];
  /**
   * task title -> item ID for new items (including draft conversions).
   * A duplicated title keeps only its earliest task, across both maps.
   */
  createdIds: Record<string, string>;
  /** task title -> item ID for tasks matched to an existing item */
  matchedIds: Record<string, string>;
  dryRun: boolean;
}

export interface ExecuteOptions {
  scope?: SyncScope;
  dryRun?: boolean;
  logger?: Logger;
}

export function createEmptyResult(dryRun: boolean = false): SyncResult {
  return {
    created: 0,
    updated: 0,
    archived: 0,
    unarchived: 0,
    unchanged: 0,
    errors: [],
    warnings: [],
    createdIds: {},
    matchedIds: {},
    dryRun,
  };
}
