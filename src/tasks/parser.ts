import * as fs from 'fs';
import * as path from 'path';
import {
  createTask,
  isCalendarDate,
  normalizeStatus,
  DEFAULT_STATUS,
  type Task,
  type TaskFile,
} from './types.js';

export const STATUS_HEADING = /^##\s+(.+)$/;
export const TASK_HEADING = /^###\s+(.+)$/;
export const ID_MARKER = /^<!--\s*id:\s*(\S+)\s*-->$/;

const ASSIGNEE_LINE = /^-\s+\*\*Assignee:\*\*\s*@?(\S+)\s*$/;
const LABELS_LINE = /^-\s+\*\*Labels:\*\*\s*(.+)$/;
const DUE_LINE = /^-\s+\*\*Due:\*\*\s*(\d{4}-\d{2}-\d{2})\s*$/;

/**
 * Whether a line belongs to a task's metadata block (id marker or a
 * recognised `- **Key:** value` bullet)
 */
export function isMetadataLine(line: string): boolean {
  const trimmed = line.trim();
  if (ID_MARKER.test(trimmed) || ASSIGNEE_LINE.test(trimmed) || LABELS_LINE.test(trimmed)) {
    return true;
  }
  const due = DUE_LINE.exec(trimmed);
  return due !== null && isCalendarDate(due[1]);
}

/**
 * Accumulates the lines of one `###` block
 */
class TaskBuilder {
  private remoteId: string | undefined;
  private assignee: string | undefined;
  private labels: string[] = [];
  private dueDate: string | undefined;
  private descriptionLines: string[] = [];
  private inMetadata = true;

  constructor(
    private readonly title: string,
    private readonly status: string
  ) {}

  feed(line: string): void {
    if (!this.inMetadata) {
      this.descriptionLines.push(line);
      return;
    }

    const trimmed = line.trim();
    if (trimmed === '') {
      return;
    }

    const id = ID_MARKER.exec(trimmed);
    if (id) {
      this.remoteId = id[1];
      return;
    }

    const assignee = ASSIGNEE_LINE.exec(trimmed);
    if (assignee) {
      this.assignee = assignee[1];
      return;
    }

    const labels = LABELS_LINE.exec(trimmed);
    if (labels) {
      this.labels = labels[1]
        .split(',')
        .map((label) => label.trim())
        .filter((label) => label.length > 0);
      return;
    }

    const due = DUE_LINE.exec(trimmed);
    if (due && isCalendarDate(due[1])) {
      this.dueDate = due[1];
      return;
    }

    this.inMetadata = false;
    this.descriptionLines.push(line);
  }

  build(): Task {
    return createTask({
      title: this.title,
      status: this.status,
      description: this.descriptionLines.join('\n').trim(),
      remoteId: this.remoteId,
      assignee: this.assignee,
      labels: this.labels,
      dueDate: this.dueDate,
    });
  }
}

/**
 * Parse TASKS.md content into an ordered task list
 *
 * `##` headings set the status of the tasks below them; `###` headings start
 * a task. Tasks that appear before any status heading are `Todo`.
 */
export function parseTasksMarkdown(content: string, sourcePath: string = ''): TaskFile {
  const tasks: Task[] = [];
  let currentStatus: string | undefined;
  let current: TaskBuilder | undefined;

  for (const line of content.split(/\r?\n/)) {
    const statusHeading = STATUS_HEADING.exec(line);
    if (statusHeading) {
      if (current) {
        tasks.push(current.build());
        current = undefined;
      }
      currentStatus = normalizeStatus(statusHeading[1]);
      continue;
    }

    const taskHeading = TASK_HEADING.exec(line);
    if (taskHeading && taskHeading[1].trim() !== '') {
      if (current) {
        tasks.push(current.build());
      }
      current = new TaskBuilder(taskHeading[1].trim(), currentStatus ?? DEFAULT_STATUS);
      continue;
    }

    current?.feed(line);
  }

  if (current) {
    tasks.push(current.build());
  }

  return { tasks, sourcePath };
}

/**
 * Parse a TASKS.md file from disk
 */
export function parseTasksFile(filePath: string): TaskFile {
  const absolutePath = path.resolve(filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Tasks file not found: ${absolutePath}`);
  }

  return parseTasksMarkdown(fs.readFileSync(absolutePath, 'utf-8'), absolutePath);
}
