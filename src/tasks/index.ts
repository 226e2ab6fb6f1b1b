export { parseTasksMarkdown, parseTasksFile, isMetadataLine } from './parser.js';
export {
  applyIdWriteback,
  writebackIds,
  stripDoneTasks,
  removeDoneTasks,
  formatIdMarker,
} from './writeback.js';
export type { RewriteResult } from './writeback.js';

export {
  CANONICAL_STATUSES,
  DEFAULT_STATUS,
  TaskSchema,
  createTask,
  normalizeStatus,
  isCalendarDate,
} from './types.js';
export type { Task, TaskFile, CanonicalStatus } from './types.js';
