import { vi, type Mock } from 'vitest';
import type { BoardItem, ProjectFields } from '../github/types.js';
import type { BoardClient } from '../sync/types.js';
import { createTask, type Task } from '../tasks/types.js';
import type { Logger } from '../utils/logger.js';

export type MockBoardClient = { [K in keyof BoardClient]: Mock<BoardClient[K]> };

// Sample task with defaults for every optional field
export const makeTask = (overrides: Partial<Task> = {}): Task =>
  createTask({
    title: 'Write docs',
    status: 'Todo',
    ...overrides,
  });

// Sample board item wrapping a draft issue
export const makeItem = (overrides: Partial<BoardItem> = {}): BoardItem => ({
  id: 'PVTI_1',
  content: { kind: 'draft', id: 'DI_1' },
  title: 'Write docs',
  status: 'Todo',
  assignee: null,
  labels: [],
  dueDate: null,
  description: '',
  ...overrides,
});

export const makeIssueItem = (overrides: Partial<BoardItem> = {}): BoardItem =>
  makeItem({
    content: { kind: 'issue', id: 'I_1', repository: { owner: 'acme', name: 'widgets' }, state: 'OPEN' },
    ...overrides,
  });

// Project fields with a Status select and an End date field
export const makeFields = (): ProjectFields =>
  new Map([
    [
      'Status',
      {
        id: 'F_status',
        name: 'Status',
        dataType: 'SINGLE_SELECT',
        options: new Map([
          ['Todo', 'opt_todo'],
          ['In Progress', 'opt_progress'],
          ['Done', 'opt_done'],
        ]),
      },
    ],
    ['End date', { id: 'F_end', name: 'End date', dataType: 'DATE', options: new Map() }],
  ]);

/**
 * In-memory BoardClient. New IDs are numbered per method, starting at 1.
 */
export function createMockClient(items: BoardItem[] = [], fields: ProjectFields = makeFields()): MockBoardClient {
  let drafts = 0;
  let issues = 0;
  let added = 0;

  return {
    listItems: vi.fn<BoardClient['listItems']>(async () => items),
    getItem: vi.fn<BoardClient['getItem']>(async () => null),
    getFields: vi.fn<BoardClient['getFields']>(async () => fields),
    createDraftItem: vi.fn<BoardClient['createDraftItem']>(async () => `PVTI_draft_${++drafts}`),
    createIssue: vi.fn<BoardClient['createIssue']>(async () => `I_new_${++issues}`),
    addItemToProject: vi.fn<BoardClient['addItemToProject']>(async () => `PVTI_added_${++added}`),
    updateItemField: vi.fn<BoardClient['updateItemField']>(async () => undefined),
    updateDraftIssue: vi.fn<BoardClient['updateDraftIssue']>(async () => undefined),
    updateIssue: vi.fn<BoardClient['updateIssue']>(async () => undefined),
    setIssueAssignees: vi.fn<BoardClient['setIssueAssignees']>(async () => undefined),
    setIssueLabels: vi.fn<BoardClient['setIssueLabels']>(async () => undefined),
    resolveUserId: vi.fn<BoardClient['resolveUserId']>(async (login) => `U_${login}`),
    resolveLabelIds: vi.fn<BoardClient['resolveLabelIds']>(async (_repository, names) =>
      names.map((name) => `L_${name}`)
    ),
    archiveItem: vi.fn<BoardClient['archiveItem']>(async () => undefined),
    unarchiveItem: vi.fn<BoardClient['unarchiveItem']>(async () => undefined),
    reopenIssue: vi.fn<BoardClient['reopenIssue']>(async () => undefined),
  };
}

export interface RecordingLogger extends Logger {
  lines: string[];
}

// Logger that keeps "LEVEL message" lines for assertions
export function createRecordingLogger(): RecordingLogger {
  const lines: string[] = [];
  return {
    lines,
    debug: (message) => lines.push(`DEBUG ${message}`),
    info: (message) => lines.push(`INFO ${message}`),
    warn: (message) => lines.push(`WARN ${message}`),
    error: (message) => lines.push(`ERROR ${message}`),
  };
}
