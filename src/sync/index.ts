export { buildSyncPlan, collectTaskIds, diffTask, needsUpdate, isInArchiveScope, sameLabelSet } from './planner.js';
export { executePlan, executeSync } from './executor.js';
export { applyTaskFields, matchStatusOption, findDueDateField } from './fields.js';
export type { ApplyFieldsOptions } from './fields.js';
export { formatPlanSummary, describePlan, formatSyncSummary, toJsonReport } from './report.js';
export type { JsonReport } from './report.js';

export { createEmptyResult } from './types.js';
export type {
  BoardClient,
  ChangeKind,
  ExecuteOptions,
  MatchedPair,
  PlannedUpdate,
  SyncPlan,
  SyncResult,
  SyncScope,
} from './types.js';
