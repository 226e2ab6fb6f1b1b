import { z } from 'zod';

/**
 * Canonical status names. Anything else found under a `##` heading is passed
 * through unchanged.
 */
export const CANONICAL_STATUSES = ['Todo', 'In Progress', 'Done'] as const;

export type CanonicalStatus = (typeof CANONICAL_STATUSES)[number];

const STATUS_ALIASES: ReadonlyMap<string, CanonicalStatus> = new Map([
  ['todo', 'Todo'],
  ['to do', 'Todo'],
  ['to-do', 'Todo'],
  ['in progress', 'In Progress'],
  ['in-progress', 'In Progress'],
  ['inprogress', 'In Progress'],
  ['done', 'Done'],
  ['completed', 'Done'],
  ['closed', 'Done'],
]);

export const DEFAULT_STATUS: CanonicalStatus = 'Todo';

/**
 * Normalize a status heading to its canonical form
 */
export function normalizeStatus(raw: string): string {
  const trimmed = raw.trim();
  return STATUS_ALIASES.get(trimmed.toLowerCase()) ?? trimmed;
}

/**
 * Whether an ISO `YYYY-MM-DD` string names a real calendar date
 */
export function isCalendarDate(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    return false;
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * A task parsed from TASKS.md: the desired state of one board item
 */
export const TaskSchema = z.object({
  title: z.string().min(1, 'Task title is required'),
  status: z.string(),
  description: z.string().default(''),
  /** Project item node ID recorded in the file (`<!-- id: ... -->`) */
  remoteId: z.string().min(1).optional(),
  assignee: z.string().min(1).optional(),
  labels: z.array(z.string()).default([]),
  dueDate: z.string().refine(isCalendarDate, 'Due date must be a YYYY-MM-DD calendar date').optional(),
});

export type Task = z.infer<typeof TaskSchema>;

/**
 * A complete parsed TASKS.md file
 */
export interface TaskFile {
  tasks: Task[];
  sourcePath: string;
}

/**
 * Build a task, applying schema defaults and validation
 */
export function createTask(input: z.input<typeof TaskSchema>): Task {
  return TaskSchema.parse(input);
}
