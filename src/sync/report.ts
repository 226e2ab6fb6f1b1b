/**
 * Plan and result reporting for console output and CI
 */

import { collectTaskIds } from './planner.js';
import type { SyncPlan, SyncResult, SyncScope } from './types.js';

/**
 * Payload written by --output-json
 */
export interface JsonReport {
  created: number;
  updated: number;
  archived: number;
  unarchived: number;
  unchanged: number;
  errors: string[];
  warnings: string[];
  created_ids: Record<string, string>;
  matched_ids: Record<string, string>;
  dry_run: boolean;
}

/**
 * One-line overview of a plan's buckets
 */
export function formatPlanSummary(plan: SyncPlan): string {
  return (
    `Plan: ${plan.create.length} to create, ${plan.update.length} to update, ` +
    `${plan.unarchive.length} to unarchive, ${plan.archive.length} to archive, ` +
    `${plan.unchanged.length} unchanged`
  );
}

/**
 * Describe every action a plan would take, one line each
 */
export function describePlan(plan: SyncPlan, scope: SyncScope = {}): string[] {
  const lines: string[] = [];
  const repository = scope.repository;
  const repoName = repository ? `${repository.owner}/${repository.name}` : '';

  const pairs = [...plan.update, ...plan.unchanged];
  const titleMatches = pairs.filter(({ task }) => plan.titleMatched.has(task.title));

  for (const { task, item } of titleMatches) {
    lines.push(`Matched '${task.title}' by title to ${item.id}`);
  }

  for (const task of plan.unarchive) {
    lines.push(`Would unarchive '${task.title}' (${task.remoteId ?? 'no ID'})`);
  }

  for (const task of plan.create) {
    const target = repository ? `an issue in ${repoName}` : 'a draft';
    lines.push(`Would create '${task.title}' as ${target} (status: ${task.status})`);
  }

  for (const { task, item, changes } of plan.update) {
    if (changes.includes('convert')) {
      lines.push(`Would convert draft '${task.title}' (${item.id}) to an issue in ${repoName}`);
    } else {
      lines.push(`Would update '${task.title}' (${item.id}) [${changes.join(', ')}]`);
    }
  }

  for (const item of plan.archive) {
    lines.push(`Would archive '${item.title}' (${item.id})`);
  }

  const { matchedIds } = collectTaskIds(plan);
  for (const { task, item } of titleMatches) {
    if (matchedIds[task.title] === item.id) {
      lines.push(`Would write back ID ${item.id} for '${task.title}'`);
    }
  }

  return lines;
}

/**
 * Format a sync result for console output
 */
export function formatSyncSummary(result: SyncResult): string {
  const lines: string[] = [];

  lines.push(result.dryRun ? 'Sync Summary (dry run)' : 'Sync Summary');
  lines.push('============');
  lines.push(`Created: ${result.created}`);
  lines.push(`Updated: ${result.updated}`);
  lines.push(`Unarchived: ${result.unarchived}`);
  lines.push(`Archived: ${result.archived}`);
  lines.push(`Unchanged: ${result.unchanged}`);
  lines.push(`Errors: ${result.errors.length}`);

  if (result.warnings.length > 0) {
    lines.push('');
    lines.push('Warnings:');
    for (const warning of result.warnings) {
      lines.push(`  [WARN] ${warning}`);
    }
  }

  if (result.errors.length > 0) {
    lines.push('');
    lines.push('Errors:');
    for (const error of result.errors) {
      lines.push(`  [FAIL] ${error}`);
    }
  }

  return lines.join('\n');
}

export function toJsonReport(result: SyncResult): JsonReport {
  return {
    created: result.created,
    updated: result.updated,
    archived: result.archived,
    unarchived: result.unarchived,
    unchanged: result.unchanged,
    errors: [...result.errors],
    warnings: [...result.warnings],
    created_ids: { ...result.createdIds },
    matched_ids: { ...result.matchedIds },
    dry_run: result.dryRun,
  };
}
