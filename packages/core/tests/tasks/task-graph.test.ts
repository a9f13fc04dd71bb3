import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readFileSync, readdirSync, rmSync } from 'fs';
import { join } from 'path';
import { TaskGraph, openTaskGraph } from '../../src/tasks/task-graph';
import { taskFileName } from '../../src/tasks/task-store';
import { TaskStoreError } from '../../src/errors';
import type { Task, TaskUpdateResult } from '../../src/types/task';
import { cleanupTempDir, createTempDir } from '../helpers';

function taskOf(result: TaskUpdateResult): Task {
  if (!result.ok) {
    throw new Error(`Expected a successful update, got ${JSON.stringify(result)}`);
  }
  return result.task;
}

/** A ∈ B.blockedBy exactly when B ∈ A.blocks */
function expectSymmetric(graph: TaskGraph): void {
  const tasks = graph.listAll();
  const byId = new Map(tasks.map((task) => [task.id, task]));
  for (const task of tasks) {
    for (const blockerId of task.blockedBy) {
      expect(byId.get(blockerId)?.blocks).toContain(task.id);
    }
    for (const blockedId of task.blocks) {
      expect(byId.get(blockedId)?.blockedBy).toContain(task.id);
    }
  }
}

describe('TaskGraph', () => {
  let dir: string;
  let graph: TaskGraph;

  beforeEach(async () => {
    dir = createTempDir('task-graph-');
    graph = await TaskGraph.open(dir);
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  describe('create', () => {
    it('should create pending tasks with increasing ids and empty edges', async () => {
      const first = await graph.create({ subject: 'Design schema' });
      const second = await graph.create({
        subject: 'Write migrations',
        description: 'Up and down',
        activeForm: 'Writing migrations',
      });

      expect(first.id).toBe('1');
      expect(second).toMatchObject({
        id: '2',
        subject: 'Write migrations',
        description: 'Up and down',
        status: 'pending',
        activeForm: 'Writing migrations',
        owner: '',
        metadata: {},
        blocks: [],
        blockedBy: [],
      });
      expect(readdirSync(dir).filter((entry) => entry.endsWith('.json')).sort()).toEqual([
        'task_1.json',
        'task_2.json',
      ]);
    });

    it('should not reuse ids of deleted tasks', async () => {
      await graph.create({ subject: 'A' });
      const b = await graph.create({ subject: 'B' });
      expect(await graph.delete(b.id)).toBe(true);

      const c = await graph.create({ subject: 'C' });

      expect(c.id).toBe('3');
    });
  });

  describe('update', () => {
    it('should report a missing task as not found', async () => {
      const result = await graph.update('42', { subject: 'Nope' });

      expect(result).toEqual({ ok: false, reason: 'not_found', taskId: '42' });
    });

    it('should apply subject, description and owner changes', async () => {
      const task = await graph.create({ subject: 'Old' });

      const updated = taskOf(
        await graph.update(task.id, { subject: 'New', description: 'Details', owner: 'carol' })
      );

      expect(updated).toMatchObject({ subject: 'New', description: 'Details', owner: 'carol' });
      expect(graph.get(task.id)).toEqual(updated);
    });

    it('should assign the acting identity when a task starts without an owner', async () => {
      const task = await graph.create({ subject: 'Build' });

      const started = taskOf(await graph.update(task.id, { status: 'in_progress' }, 'alice'));

      expect(started.status).toBe('in_progress');
      expect(started.owner).toBe('alice');
    });

    it('should fall back to the default actor and keep an existing owner', async () => {
      const owned = await graph.create({ subject: 'Owned' });
      await graph.update(owned.id, { owner: 'bob' });
      const unowned = await graph.create({ subject: 'Unowned' });

      const startedOwned = taskOf(await graph.update(owned.id, { status: 'in_progress' }, 'alice'));
      const startedUnowned = taskOf(await graph.update(unowned.id, { status: 'in_progress' }));

      expect(startedOwned.owner).toBe('bob');
      expect(startedUnowned.owner).toBe('agent');
    });

    it('should merge metadata and delete keys set to null', async () => {
      const task = await graph.create({ subject: 'Tagged', metadata: { area: 'api', priority: 'high' } });

      const updated = taskOf(
        await graph.update(task.id, { metadata: { priority: null, sprint: '12' } })
      );

      expect(updated.metadata).toEqual({ area: 'api', sprint: '12' });
    });

    it('should reject an unknown status without writing anything', async () => {
      const task = await graph.create({ subject: 'Stable' });
      const before = readFileSync(join(dir, taskFileName(task.id)), 'utf-8');

      const result = await graph.update(task.id, { subject: 'Changed', status: 'done' });

      expect(result).toEqual({
        ok: false,
        reason: 'invalid',
        message: 'Invalid status: done (expected one of pending, in_progress, completed)',
      });
      expect(readFileSync(join(dir, taskFileName(task.id)), 'utf-8')).toBe(before);
      expect(graph.get(task.id)?.subject).toBe('Stable');
    });

    it('should leave every record unchanged when one dependency id is unknown', async () => {
      const a = await graph.create({ subject: 'A' });
      const b = await graph.create({ subject: 'B' });
      const beforeA = readFileSync(join(dir, taskFileName(a.id)), 'utf-8');
      const beforeB = readFileSync(join(dir, taskFileName(b.id)), 'utf-8');

      const result = await graph.update(b.id, { subject: 'B2', addBlockedBy: [a.id, '99'] });

      expect(result).toEqual({ ok: false, reason: 'invalid', message: 'Task #99 not found' });
      expect(readFileSync(join(dir, taskFileName(a.id)), 'utf-8')).toBe(beforeA);
      expect(readFileSync(join(dir, taskFileName(b.id)), 'utf-8')).toBe(beforeB);
    });

    it('should reject a task depending on itself', async () => {
      const a = await graph.create({ subject: 'A' });

      const result = await graph.addBlockedBy(a.id, [a.id]);

      expect(result).toEqual({
        ok: false,
        reason: 'invalid',
        message: 'Task #1 cannot depend on itself',
      });
    });

    it('should reject dependencies that would form a cycle', async () => {
      const a = await graph.create({ subject: 'A' });
      const b = await graph.create({ subject: 'B' });
      const c = await graph.create({ subject: 'C' });
      await graph.addBlockedBy(b.id, [a.id]);
      await graph.addBlockedBy(c.id, [b.id]);

      const result = await graph.addBlockedBy(a.id, [c.id]);

      expect(result).toEqual({
        ok: false,
        reason: 'invalid',
        message: 'Adding #3 as a blocker of #1 would create a cycle',
      });
      expect(graph.get(a.id)?.blockedBy).toEqual([]);
    });

    it('should reject a cycle formed by edges added in the same update', async () => {
      const a = await graph.create({ subject: 'A' });
      const b = await graph.create({ subject: 'B' });

      const result = await graph.update(a.id, { addBlockedBy: [b.id], addBlocks: [b.id] });

      expect(result).toEqual({
        ok: false,
        reason: 'invalid',
        message: 'Adding #2 as blocked by #1 would create a cycle',
      });
      expect(graph.get(a.id)).toMatchObject({ blocks: [], blockedBy: [] });
      expect(graph.get(b.id)).toMatchObject({ blocks: [], blockedBy: [] });
    });

    it('should reject a completed task as a new blocker', async () => {
      const done = await graph.create({ subject: 'Done' });
      await graph.update(done.id, { status: 'completed' });
      const next = await graph.create({ subject: 'Next' });

      const result = await graph.addBlockedBy(next.id, [done.id]);

      expect(result).toEqual({
        ok: false,
        reason: 'invalid',
        message: 'Task #1 is already completed and cannot block #2',
      });
    });
  });

  describe('dependencies', () => {
    it('should record both endpoints of a blocking edge', async () => {
      const a = await graph.create({ subject: 'A' });
      const b = await graph.create({ subject: 'B' });

      const updated = taskOf(await graph.addBlockedBy(b.id, [a.id]));

      expect(updated.blockedBy).toEqual(['1']);
      expect(graph.get(a.id)?.blocks).toEqual(['2']);
      expectSymmetric(graph);
    });

    it('should accept edges given from the blocking side', async () => {
      const a = await graph.create({ subject: 'A' });
      const b = await graph.create({ subject: 'B' });

      await graph.update(a.id, { addBlocks: [b.id] });

      expect(graph.get(b.id)?.blockedBy).toEqual(['1']);
      expect(graph.get(a.id)?.blocks).toEqual(['2']);
    });

    it('should not duplicate an edge added twice', async () => {
      const a = await graph.create({ subject: 'A' });
      const b = await graph.create({ subject: 'B' });

      await graph.addBlockedBy(b.id, [a.id]);
      await graph.addBlockedBy(b.id, [a.id]);

      expect(graph.get(b.id)?.blockedBy).toEqual(['1']);
      expect(graph.get(a.id)?.blocks).toEqual(['2']);
    });

    it('should remove only the completed task from its dependents', async () => {
      const a = await graph.create({ subject: 'A' });
      const b = await graph.create({ subject: 'B' });
      const c = await graph.create({ subject: 'C' });
      await graph.addBlockedBy(c.id, [a.id, b.id]);

      const completed = taskOf(await graph.update(a.id, { status: 'completed' }));

      expect(completed.blocks).toEqual([]);
      expect(graph.get(c.id)?.blockedBy).toEqual(['2']);
      expect(graph.get(b.id)?.blocks).toEqual(['3']);
      expectSymmetric(graph);
    });

    it('should unblock every dependent of a completed task', async () => {
      const base = await graph.create({ subject: 'Base' });
      const left = await graph.create({ subject: 'Left' });
      const right = await graph.create({ subject: 'Right' });
      await graph.addBlockedBy(left.id, [base.id]);
      await graph.addBlockedBy(right.id, [base.id]);

      await graph.update(base.id, { status: 'completed' });

      expect(graph.get(left.id)?.blockedBy).toEqual([]);
      expect(graph.get(right.id)?.blockedBy).toEqual([]);
      expectSymmetric(graph);
    });

    it('should keep both endpoints consistent under concurrent edge updates', async () => {
      const tasks = await Promise.all(
        ['A', 'B', 'C', 'D'].map((subject) => graph.create({ subject }))
      );
      const ids = tasks.map((task) => task.id).sort((x, y) => Number(x) - Number(y));
      const [a, b, c, d] = ids;

      const results = await Promise.all([
        graph.addBlockedBy(d, [a]),
        graph.addBlockedBy(d, [b]),
        graph.addBlockedBy(d, [c]),
        graph.update(a, { addBlocks: [c] }),
        graph.update(b, { metadata: { touched: 'yes' } }),
      ]);

      expect(results.every((result) => result.ok)).toBe(true);
      expect([...(graph.get(d)?.blockedBy ?? [])].sort()).toEqual([a, b, c].sort());
      expect(graph.get(a)?.blocks.sort()).toEqual([c, d].sort());
      expect(graph.get(b)?.metadata).toEqual({ touched: 'yes' });
      expectSymmetric(graph);
    });

    it('should detach a deleted task from the tasks that referenced it', async () => {
      const a = await graph.create({ subject: 'A' });
      const b = await graph.create({ subject: 'B' });
      const c = await graph.create({ subject: 'C' });
      await graph.addBlockedBy(b.id, [a.id]);
      await graph.addBlockedBy(c.id, [b.id]);

      expect(await graph.delete(b.id)).toBe(true);

      expect(graph.get(b.id)).toBeUndefined();
      expect(graph.get(a.id)?.blocks).toEqual([]);
      expect(graph.get(c.id)?.blockedBy).toEqual([]);
      expectSymmetric(graph);
    });

    it('should report false when deleting a missing task', async () => {
      expect(await graph.delete('7')).toBe(false);
    });
  });

  describe('persistence', () => {
    it('should reload identical tasks, metadata and edges', async () => {
      const a = await graph.create({ subject: 'A', metadata: { component: 'parser' } });
      const b = await graph.create({ subject: 'B', activeForm: 'Doing B' });
      await graph.addBlockedBy(b.id, [a.id]);
      await graph.update(a.id, { status: 'in_progress' }, 'dana');

      const reloaded = await TaskGraph.open(dir);

      expect(reloaded.listAll()).toEqual(graph.listAll());
    });

    it('should keep both endpoints unchanged when an edge cannot be written', async () => {
      const a = await graph.create({ subject: 'A' });
      const b = await graph.create({ subject: 'B' });
      mkdirSync(join(dir, `${taskFileName(a.id)}.${process.pid}.tmp`));

      await expect(graph.addBlockedBy(b.id, [a.id])).rejects.toThrow(TaskStoreError);

      expect(graph.get(a.id)?.blocks).toEqual([]);
      expect(graph.get(b.id)?.blockedBy).toEqual([]);
      const reloaded = await TaskGraph.open(dir);
      expect(reloaded.listAll().map((task) => [task.id, task.blocks, task.blockedBy])).toEqual([
        ['1', [], []],
        ['2', [], []],
      ]);
    });

    it('should continue allocation after all task files were removed from disk', async () => {
      await graph.create({ subject: 'A' });
      await graph.create({ subject: 'B' });
      await graph.create({ subject: 'C' });
      for (const entry of readdirSync(dir)) {
        if (entry.startsWith('task_')) rmSync(join(dir, entry));
      }

      const reloaded = await TaskGraph.open(dir);
      const next = await reloaded.create({ subject: 'D' });

      expect(reloaded.listAll().map((task) => task.id)).toEqual(['4']);
      expect(next.id).toBe('4');
    });
  });

  describe('openTaskGraph', () => {
    it('should share one graph per directory', async () => {
      const first = await openTaskGraph(dir);
      const second = await openTaskGraph(join(dir, '.'));

      expect(second).toBe(first);
    });
  });
});
