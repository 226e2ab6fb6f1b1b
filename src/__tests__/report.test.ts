import { describe, it, expect } from 'vitest';
import { buildSyncPlan } from '../sync/planner.js';
import { describePlan, formatPlanSummary, formatSyncSummary, toJsonReport } from '../sync/report.js';
import { createEmptyResult } from '../sync/types.js';
import { makeIssueItem, makeItem, makeTask } from './helpers.js';

const repoScope = { repository: { owner: 'acme', name: 'widgets' } };

describe('Sync Reporting', () => {
  describe('formatPlanSummary', () => {
    it('counts every bucket', () => {
      const plan = buildSyncPlan(
        [makeTask({ title: 'New' }), makeTask({ title: 'Gone', remoteId: 'PVTI_gone' })],
        [makeItem({ id: 'PVTI_x', title: 'Extra' })]
      );

      expect(formatPlanSummary(plan)).toBe(
        'Plan: 1 to create, 0 to update, 1 to unarchive, 1 to archive, 0 unchanged'
      );
    });
  });

  describe('describePlan', () => {
    it('describes each action in execution order', () => {
      const plan = buildSyncPlan(
        [
          makeTask({ title: 'Matched', status: 'Done' }),
          makeTask({ title: 'Revived', remoteId: 'PVTI_gone' }),
          makeTask({ title: 'New', status: 'In Progress' }),
        ],
        [
          makeIssueItem({ id: 'PVTI_m', title: 'Matched' }),
          makeIssueItem({ id: 'PVTI_x', title: 'Extra' }),
        ],
        repoScope
      );

      expect(describePlan(plan, repoScope)).toEqual([
        "Matched 'Matched' by title to PVTI_m",
        "Would unarchive 'Revived' (PVTI_gone)",
        "Would create 'New' as an issue in acme/widgets (status: In Progress)",
        "Would update 'Matched' (PVTI_m) [status]",
        "Would archive 'Extra' (PVTI_x)",
        "Would write back ID PVTI_m for 'Matched'",
      ]);
    });

    it('describes draft conversions and does not promise their old IDs', () => {
      const plan = buildSyncPlan([makeTask({ title: 'Write docs' })], [makeItem()], repoScope);

      expect(describePlan(plan, repoScope)).toEqual([
        "Matched 'Write docs' by title to PVTI_1",
        "Would convert draft 'Write docs' (PVTI_1) to an issue in acme/widgets",
      ]);
    });

    it('promises a write back only for the first of duplicated titles', () => {
      const plan = buildSyncPlan(
        [makeTask({ title: 'Twin' }), makeTask({ title: 'Twin' })],
        [makeItem({ id: 'PVTI_a', title: 'Twin' }), makeItem({ id: 'PVTI_b', title: 'Twin' })]
      );

      expect(describePlan(plan)).toEqual([
        "Matched 'Twin' by title to PVTI_a",
        "Matched 'Twin' by title to PVTI_b",
        "Would write back ID PVTI_a for 'Twin'",
      ]);
    });

    it('creates drafts without a repository scope', () => {
      const plan = buildSyncPlan([makeTask({ title: 'Solo' })], []);

      expect(describePlan(plan)).toEqual(["Would create 'Solo' as a draft (status: Todo)"]);
    });
  });

  describe('formatSyncSummary', () => {
    it('lists counts, warnings and errors', () => {
      const result = {
        ...createEmptyResult(),
        created: 2,
        updated: 1,
        unchanged: 4,
        warnings: ["Could not resolve assignee 'ghost' for 'Task'"],
        errors: ["Failed to archive 'Old': boom"],
      };

      expect(formatSyncSummary(result)).toBe(
        [
          'Sync Summary',
          '============',
          'Created: 2',
          'Updated: 1',
          'Unarchived: 0',
          'Archived: 0',
          'Unchanged: 4',
          'Errors: 1',
          '',
          'Warnings:',
          "  [WARN] Could not resolve assignee 'ghost' for 'Task'",
          '',
          'Errors:',
          "  [FAIL] Failed to archive 'Old': boom",
        ].join('\n')
      );
    });

    it('marks dry runs', () => {
      expect(formatSyncSummary(createEmptyResult(true)).split('\n')[0]).toBe('Sync Summary (dry run)');
    });
  });

  describe('toJsonReport', () => {
    it('uses snake_case keys', () => {
      const result = {
        ...createEmptyResult(true),
        created: 1,
        createdIds: { New: 'PVTI_n' },
        matchedIds: { Old: 'PVTI_o' },
      };

      expect(toJsonReport(result)).toEqual({
        created: 1,
        updated: 0,
        archived: 0,
        unarchived: 0,
        unchanged: 0,
        errors: [],
        warnings: [],
        created_ids: { New: 'PVTI_n' },
        matched_ids: { Old: 'PVTI_o' },
        dry_run: true,
      });
    });
  });
});
