import { describe, it, expect } from 'vitest';
import { executePlan, executeSync } from '../sync/executor.js';
import { buildSyncPlan } from '../sync/planner.js';
import { createMockClient, createRecordingLogger, makeIssueItem, makeItem, makeTask } from './helpers.js';

const repoScope = { repository: { owner: 'acme', name: 'widgets' } };

describe('Plan Executor', () => {
  describe('executeSync', () => {
    it('updates only the status of a title-matched item', async () => {
      const client = createMockClient([makeItem({ id: '42', title: 'Fix bug', status: 'Todo' })]);
      const task = makeTask({ title: 'Fix bug', status: 'In Progress' });

      const result = await executeSync(client, { tasks: [task], sourcePath: 'TASKS.md' });

      expect(result.updated).toBe(1);
      expect(result.errors).toEqual([]);
      expect(client.updateItemField).toHaveBeenCalledTimes(1);
      expect(client.updateItemField).toHaveBeenCalledWith('42', 'F_status', {
        kind: 'singleSelect',
        optionId: 'opt_progress',
      });
      expect(client.updateDraftIssue).not.toHaveBeenCalled();
      expect(client.updateIssue).not.toHaveBeenCalled();
      expect(result.matchedIds).toEqual({ 'Fix bug': '42' });
    });

    it('propagates listing failures', async () => {
      const client = createMockClient();
      client.listItems.mockRejectedValue(new Error('Authentication failed. Check your GitHub token.'));

      await expect(executeSync(client, { tasks: [makeTask()], sourcePath: '' })).rejects.toThrow(
        'Authentication failed. Check your GitHub token.'
      );
      expect(client.createDraftItem).not.toHaveBeenCalled();
    });

    it('logs plan warnings and copies them into the result', async () => {
      const logger = createRecordingLogger();
      const client = createMockClient([
        makeItem({ id: 'PVTI_a', title: 'Dup' }),
        makeItem({ id: 'PVTI_b', title: 'Dup' }),
      ]);

      const result = await executeSync(
        client,
        { tasks: [makeTask({ title: 'Dup' })], sourcePath: '' },
        { logger, dryRun: true }
      );

      const warning = "Task 'Dup' matched one of 2 board items with the same title; using PVTI_a";
      expect(logger.lines).toContain(`WARN ${warning}`);
      expect(result.warnings).toEqual([warning]);
    });
  });

  describe('executePlan', () => {
    it('creates drafts without a repository scope and records their IDs', async () => {
      const client = createMockClient();
      const task = makeTask({ title: 'New task', description: 'body', dueDate: '2025-06-01', assignee: 'bob' });
      const plan = buildSyncPlan([task], []);

      const result = await executePlan(client, plan);

      expect(client.createDraftItem).toHaveBeenCalledWith('New task', 'body');
      expect(client.updateItemField).toHaveBeenCalledWith('PVTI_draft_1', 'F_status', {
        kind: 'singleSelect',
        optionId: 'opt_todo',
      });
      expect(client.updateItemField).toHaveBeenCalledWith('PVTI_draft_1', 'F_end', {
        kind: 'date',
        date: '2025-06-01',
      });
      expect(client.setIssueAssignees).not.toHaveBeenCalled();
      expect(client.updateDraftIssue).not.toHaveBeenCalled();
      expect(result.created).toBe(1);
      expect(result.createdIds).toEqual({ 'New task': 'PVTI_draft_1' });
    });

    it('creates issues in the scoped repository with assignee and labels', async () => {
      const client = createMockClient();
      const task = makeTask({ title: 'New issue', assignee: 'bob', labels: ['bug', 'docs'] });
      const plan = buildSyncPlan([task], [], repoScope);

      const result = await executePlan(client, plan, { scope: repoScope });

      expect(client.createIssue).toHaveBeenCalledWith(repoScope.repository, 'New issue', '');
      expect(client.addItemToProject).toHaveBeenCalledWith('I_new_1');
      expect(client.setIssueAssignees).toHaveBeenCalledWith('I_new_1', ['U_bob']);
      expect(client.resolveLabelIds).toHaveBeenCalledWith(repoScope.repository, ['bug', 'docs']);
      expect(client.setIssueLabels).toHaveBeenCalledWith('I_new_1', ['L_bug', 'L_docs']);
      expect(client.createDraftItem).not.toHaveBeenCalled();
      expect(result.createdIds).toEqual({ 'New issue': 'PVTI_added_1' });
    });

    it('converts a matched draft into an issue under a repository scope', async () => {
      const client = createMockClient();
      const task = makeTask({ remoteId: 'PVTI_1', description: 'details' });
      const plan = buildSyncPlan([task], [makeItem({ description: 'details' })], repoScope);

      const result = await executePlan(client, plan, { scope: repoScope });

      expect(client.createIssue).toHaveBeenCalledWith(repoScope.repository, 'Write docs', 'details');
      expect(client.addItemToProject).toHaveBeenCalledWith('I_new_1');
      expect(client.archiveItem).toHaveBeenCalledWith('PVTI_1');
      expect(client.updateDraftIssue).not.toHaveBeenCalled();
      expect(client.updateItemField).toHaveBeenCalledWith('PVTI_added_1', 'F_status', {
        kind: 'singleSelect',
        optionId: 'opt_todo',
      });
      expect(result.updated).toBe(1);
      expect(result.createdIds).toEqual({ 'Write docs': 'PVTI_added_1' });
      expect(result.matchedIds).toEqual({});
    });

    it('uses the draft mutation for drafts and the issue mutation for issues', async () => {
      const client = createMockClient();
      const plan = buildSyncPlan(
        [
          makeTask({ title: 'Draft task', remoteId: 'PVTI_d', description: 'new draft body' }),
          makeTask({ title: 'Issue task', remoteId: 'PVTI_i', description: 'new issue body' }),
        ],
        [
          makeItem({ id: 'PVTI_d', title: 'Draft task', content: { kind: 'draft', id: 'DI_d' } }),
          makeIssueItem({ id: 'PVTI_i', title: 'Old issue title' }),
        ]
      );

      await executePlan(client, plan);

      expect(client.updateDraftIssue).toHaveBeenCalledTimes(1);
      expect(client.updateDraftIssue).toHaveBeenCalledWith('DI_d', 'Draft task', 'new draft body');
      expect(client.updateIssue).toHaveBeenCalledTimes(1);
      expect(client.updateIssue).toHaveBeenCalledWith('I_1', 'Issue task', 'new issue body');
    });

    it('does not touch pull request content', async () => {
      const client = createMockClient();
      const plan = buildSyncPlan(
        [makeTask({ remoteId: 'PVTI_pr', title: 'Renamed' })],
        [makeItem({ id: 'PVTI_pr', content: { kind: 'pullRequest', id: 'PR_1' } })]
      );

      const result = await executePlan(client, plan);

      expect(client.updateDraftIssue).not.toHaveBeenCalled();
      expect(client.updateIssue).not.toHaveBeenCalled();
      expect(result.updated).toBe(1);
    });

    it('unarchives, reopens issues, and reapplies fields', async () => {
      const client = createMockClient();
      client.getItem.mockResolvedValue(
        makeIssueItem({ id: 'PVTI_old', title: 'Old work', status: 'Done' })
      );
      const plan = buildSyncPlan([makeTask({ title: 'Old work', remoteId: 'PVTI_old', status: 'In Progress' })], []);

      const result = await executePlan(client, plan);

      expect(client.unarchiveItem).toHaveBeenCalledWith('PVTI_old');
      expect(client.reopenIssue).toHaveBeenCalledWith('I_1');
      expect(client.updateItemField).toHaveBeenCalledWith('PVTI_old', 'F_status', {
        kind: 'singleSelect',
        optionId: 'opt_progress',
      });
      expect(result.unarchived).toBe(1);
      expect(result.errors).toEqual([]);
    });

    it('treats a failed reopen as a warning', async () => {
      const client = createMockClient();
      client.getItem.mockResolvedValue(makeIssueItem({ id: 'PVTI_old', title: 'Old work' }));
      client.reopenIssue.mockRejectedValue(new Error('issue is locked'));
      const plan = buildSyncPlan([makeTask({ title: 'Old work', remoteId: 'PVTI_old' })], []);

      const result = await executePlan(client, plan);

      expect(result.unarchived).toBe(1);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual(["Unarchived 'Old work' but could not reopen its issue: issue is locked"]);
    });

    it('does not reopen drafts', async () => {
      const client = createMockClient();
      client.getItem.mockResolvedValue(makeItem({ id: 'PVTI_old' }));
      const plan = buildSyncPlan([makeTask({ remoteId: 'PVTI_old' })], []);

      await executePlan(client, plan);

      expect(client.reopenIssue).not.toHaveBeenCalled();
    });

    it('records one error per failed item and continues', async () => {
      const client = createMockClient();
      client.createDraftItem.mockRejectedValueOnce(new Error('boom'));
      const plan = buildSyncPlan(
        [makeTask({ title: 'Fails' }), makeTask({ title: 'Works' })],
        [makeItem({ id: 'PVTI_stale', title: 'Stale' })]
      );

      const result = await executePlan(client, plan);

      expect(result.errors).toEqual(["Failed to create 'Fails': boom"]);
      expect(result.created).toBe(1);
      expect(result.createdIds).toEqual({ Works: 'PVTI_draft_1' });
      expect(result.archived).toBe(1);
      expect(client.archiveItem).toHaveBeenCalledWith('PVTI_stale');
    });

    it('runs unarchive, create, update and archive in that order', async () => {
      const client = createMockClient();
      const calls: string[] = [];
      client.unarchiveItem.mockImplementation(async () => {
        calls.push('unarchive');
      });
      client.createDraftItem.mockImplementation(async () => {
        calls.push('create');
        return 'PVTI_new';
      });
      client.updateDraftIssue.mockImplementation(async () => {
        calls.push('update');
      });
      client.archiveItem.mockImplementation(async () => {
        calls.push('archive');
      });

      const plan = buildSyncPlan(
        [
          makeTask({ title: 'Edited', remoteId: 'PVTI_e', description: 'changed' }),
          makeTask({ title: 'Fresh' }),
          makeTask({ title: 'Revived', remoteId: 'PVTI_gone' }),
        ],
        [
          makeItem({ id: 'PVTI_x', title: 'Extra' }),
          makeItem({ id: 'PVTI_e', title: 'Edited', content: { kind: 'draft', id: 'DI_e' } }),
        ]
      );

      await executePlan(client, plan);

      expect(calls).toEqual(['unarchive', 'create', 'update', 'archive']);
    });

    it('gives a duplicated title the ID of its earliest task', async () => {
      const client = createMockClient();
      const plan = buildSyncPlan(
        [makeTask({ title: 'Twin' }), makeTask({ title: 'Twin' }), makeTask({ title: 'Solo' })],
        [makeItem({ id: 'PVTI_twin', title: 'Twin' })]
      );

      const result = await executePlan(client, plan);

      expect(result.created).toBe(2);
      expect(result.matchedIds).toEqual({ Twin: 'PVTI_twin' });
      expect(result.createdIds).toEqual({ Solo: 'PVTI_draft_2' });
    });

    it('keeps the first created ID when both twins are new', async () => {
      const client = createMockClient();
      const plan = buildSyncPlan([makeTask({ title: 'Twin' }), makeTask({ title: 'Twin' })], []);

      const result = await executePlan(client, plan);

      expect(result.createdIds).toEqual({ Twin: 'PVTI_draft_1' });
      expect(result.matchedIds).toEqual({});
    });

    it('mutates nothing in dry-run mode and reports plan sizes', async () => {
      const client = createMockClient();
      const logger = createRecordingLogger();
      const plan = buildSyncPlan(
        [
          makeTask({ title: 'Fix bug', status: 'Done' }),
          makeTask({ title: 'Brand new' }),
        ],
        [makeItem({ id: 'PVTI_fix', title: 'Fix bug' }), makeItem({ id: 'PVTI_x', title: 'Extra' })]
      );

      const result = await executePlan(client, plan, { dryRun: true, logger });

      expect(result).toMatchObject({ created: 1, updated: 1, archived: 1, unarchived: 0, unchanged: 0, dryRun: true });
      expect(client.getFields).not.toHaveBeenCalled();
      expect(client.createDraftItem).not.toHaveBeenCalled();
      expect(client.updateItemField).not.toHaveBeenCalled();
      expect(client.archiveItem).not.toHaveBeenCalled();
      expect(logger.lines).toContain("INFO [DRY RUN] Matched 'Fix bug' by title to PVTI_fix");
      expect(logger.lines).toContain("INFO [DRY RUN] Would write back ID PVTI_fix for 'Fix bug'");
      expect(result.matchedIds).toEqual({ 'Fix bug': 'PVTI_fix' });
    });

    it('skips the field lookup when only archiving', async () => {
      const client = createMockClient();
      const plan = buildSyncPlan([], [makeItem()]);

      const result = await executePlan(client, plan);

      expect(client.getFields).not.toHaveBeenCalled();
      expect(result.archived).toBe(1);
    });
  });
});
