/**
 * Task graph - dependency-aware operations over a TaskStore
 *
 * Edges are kept on both endpoints: `a.blocks` lists b exactly when
 * `b.blockedBy` lists a. Every mutation locks all records it may touch before
 * reading them, so two actors editing overlapping edges cannot lose updates.
 */

import { resolve } from 'path';
import type {
  Task,
  TaskCreateFields,
  TaskUpdateFields,
  TaskUpdateResult,
} from '../types/task';
import { isTaskStatus, TASK_STATUSES } from '../types/task';
import { logger } from '../utils/logger';
import { KeyedMutex } from './keyed-mutex';
import { TaskStore } from './task-store';

export interface TaskGraphOptions {
  /** Owner assigned when a task is started without one (default: 'agent') */
  defaultActor?: string;
}

const RETRY = Symbol('retry');

function invalid(message: string): TaskUpdateResult {
  return { ok: false, reason: 'invalid', message };
}

function notFound(taskId: string): TaskUpdateResult {
  return { ok: false, reason: 'not_found', taskId };
}

function addUnique(list: string[], id: string): string[] {
  return list.includes(id) ? list : [...list, id];
}

function without(list: string[], id: string): string[] {
  return list.filter((entry) => entry !== id);
}

export class TaskGraph {
  private readonly locks = new KeyedMutex();
  private readonly defaultActor: string;

  constructor(
    private readonly store: TaskStore,
    options: TaskGraphOptions = {}
  ) {
    this.defaultActor = options.defaultActor ?? 'agent';
  }

  static async open(dir: string, options?: TaskGraphOptions): Promise<TaskGraph> {
    return new TaskGraph(await TaskStore.open(dir), options);
  }

  get dir(): string {
    return this.store.dir;
  }

  async create(fields: TaskCreateFields): Promise<Task> {
    const id = await this.store.allocate();
    const now = Date.now();
    const task: Task = {
      id,
      subject: fields.subject,
      description: fields.description ?? '',
      status: 'pending',
      activeForm: fields.activeForm ?? '',
      owner: '',
      metadata: { ...fields.metadata },
      blocks: [],
      blockedBy: [],
      createdAt: now,
      updatedAt: now,
    };

    await this.locks.withLock(id, () => this.store.write(task));
    logger.debug('[TaskGraph] Created task:', { id, subject: task.subject });
    return task;
  }

  get(id: string): Task | undefined {
    return this.store.read(id);
  }

  listAll(): Task[] {
    return this.store.list();
  }

  /**
   * Apply field changes to one task. Nothing is written unless every field
   * validates. Starting a task without an owner assigns `actor`; completing it
   * removes it from the `blockedBy` of every task waiting on it.
   */
  async update(id: string, fields: TaskUpdateFields, actor?: string): Promise<TaskUpdateResult> {
    const shapeError = this.validateShape(fields);
    if (shapeError) {
      return invalid(shapeError);
    }

    const completing = fields.status === 'completed';
    const related = [...(fields.addBlockedBy ?? []), ...(fields.addBlocks ?? [])];

    return this.withTaskLocks(
      () => {
        const keys = new Set([id, ...related]);
        if (completing) {
          for (const dependent of this.dependentsOf(id)) keys.add(dependent);
          for (const blocked of this.store.read(id)?.blocks ?? []) keys.add(blocked);
        }
        return keys;
      },
      async () => {
        const current = this.store.read(id);
        if (!current) {
          return notFound(id);
        }

        const edgeError = this.validateEdges(current, fields.addBlockedBy ?? [], fields.addBlocks ?? []);
        if (edgeError) {
          return invalid(edgeError);
        }

        const changed = new Map<string, Task>();
        const next: Task = { ...current, metadata: { ...current.metadata } };
        changed.set(id, next);

        if (fields.subject !== undefined) next.subject = fields.subject;
        if (fields.description !== undefined) next.description = fields.description;
        if (fields.activeForm !== undefined) next.activeForm = fields.activeForm;
        if (fields.owner !== undefined) next.owner = fields.owner;

        if (fields.metadata) {
          for (const [key, value] of Object.entries(fields.metadata)) {
            if (value === null) {
              delete next.metadata[key];
            } else {
              next.metadata[key] = value;
            }
          }
        }

        for (const predecessorId of fields.addBlockedBy ?? []) {
          this.link(changed, predecessorId, id);
        }
        for (const successorId of fields.addBlocks ?? []) {
          this.link(changed, id, successorId);
        }

        if (fields.status !== undefined && isTaskStatus(fields.status)) {
          next.status = fields.status;
          if (next.status === 'in_progress' && next.owner === '') {
            next.owner = actor ?? this.defaultActor;
          }
          if (next.status === 'completed') {
            this.cascadeCompletion(changed, id);
          }
        }

        await this.writeAll(changed);
        return { ok: true, task: this.working(changed, id) };
      }
    );
  }

  /** Record that `id` cannot start until every id in `predecessorIds` completes */
  async addBlockedBy(id: string, predecessorIds: string[]): Promise<TaskUpdateResult> {
    return this.update(id, { addBlockedBy: predecessorIds });
  }

  /**
   * Remove a task record. Edges pointing at it from other tasks are removed
   * too; the id allocator is left untouched.
   */
  async delete(id: string): Promise<boolean> {
    return this.withTaskLocks(
      () => {
        const task = this.store.read(id);
        const keys = new Set([id, ...this.dependentsOf(id), ...this.blockersOf(id)]);
        for (const other of [...(task?.blocks ?? []), ...(task?.blockedBy ?? [])]) keys.add(other);
        return keys;
      },
      async () => {
        const task = this.store.read(id);
        if (!task) {
          return false;
        }

        const changed = new Map<string, Task>();
        for (const other of this.store.list()) {
          if (other.id === id) continue;
          if (other.blocks.includes(id) || other.blockedBy.includes(id)) {
            changed.set(other.id, {
              ...other,
              blocks: without(other.blocks, id),
              blockedBy: without(other.blockedBy, id),
            });
          }
        }

        await this.writeAll(changed);
        const removed = await this.store.remove(id);
        logger.debug('[TaskGraph] Deleted task:', { id, detachedFrom: [...changed.keys()] });
        return removed;
      }
    );
  }

  private validateShape(fields: TaskUpdateFields): string | undefined {
    if (fields.status !== undefined && !isTaskStatus(fields.status)) {
      return `Invalid status: ${fields.status} (expected one of ${TASK_STATUSES.join(', ')})`;
    }
    if (fields.subject !== undefined && fields.subject.trim() === '') {
      return 'Subject cannot be empty';
    }
    for (const [key, value] of Object.entries(fields.metadata ?? {})) {
      if (value !== null && typeof value !== 'string') {
        return `Metadata value for "${key}" must be a string or null`;
      }
    }
    return undefined;
  }

  private validateEdges(task: Task, blockedBy: string[], blocks: string[]): string | undefined {
    for (const otherId of [...blockedBy, ...blocks]) {
      if (otherId === task.id) {
        return `Task #${task.id} cannot depend on itself`;
      }
      if (!this.store.has(otherId)) {
        return `Task #${otherId} not found`;
      }
    }
    // Edges accepted earlier in this call count toward later cycle checks
    const pending = new Map<string, string[]>();
    const accept = (blockerId: string, blockedId: string) => {
      pending.set(blockerId, [...(pending.get(blockerId) ?? []), blockedId]);
    };

    for (const predecessorId of blockedBy) {
      if (this.store.read(predecessorId)?.status === 'completed') {
        return `Task #${predecessorId} is already completed and cannot block #${task.id}`;
      }
      if (this.reaches(task.id, predecessorId, pending)) {
        return `Adding #${predecessorId} as a blocker of #${task.id} would create a cycle`;
      }
      accept(predecessorId, task.id);
    }
    for (const successorId of blocks) {
      if (task.status === 'completed') {
        return `Task #${task.id} is already completed and cannot block #${successorId}`;
      }
      if (this.reaches(successorId, task.id, pending)) {
        return `Adding #${successorId} as blocked by #${task.id} would create a cycle`;
      }
      accept(task.id, successorId);
    }
    return undefined;
  }

  /** True when `to` is reachable from `from` by following stored and pending `blocks` edges */
  private reaches(from: string, to: string, pending: Map<string, string[]>): boolean {
    const seen = new Set<string>();
    const queue = [from];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || seen.has(current)) continue;
      if (current === to) return true;
      seen.add(current);
      queue.push(...(this.store.read(current)?.blocks ?? []), ...(pending.get(current) ?? []));
    }
    return false;
  }

  private link(changed: Map<string, Task>, blockerId: string, blockedId: string): void {
    const blocker = this.working(changed, blockerId);
    const blocked = this.working(changed, blockedId);
    blocker.blocks = addUnique(blocker.blocks, blockedId);
    blocked.blockedBy = addUnique(blocked.blockedBy, blockerId);
  }

  private cascadeCompletion(changed: Map<string, Task>, id: string): void {
    const completed = this.working(changed, id);
    const dependents = new Set([...this.dependentsOf(id), ...completed.blocks]);
    for (const dependentId of dependents) {
      if (dependentId === id || !this.store.has(dependentId)) continue;
      const dependent = this.working(changed, dependentId);
      dependent.blockedBy = without(dependent.blockedBy, id);
      completed.blocks = without(completed.blocks, dependentId);
    }
    if (dependents.size > 0) {
      logger.debug('[TaskGraph] Completion unblocked tasks:', { id, unblocked: [...dependents] });
    }
  }

  /** Pending copy of a record inside one mutation */
  private working(changed: Map<string, Task>, id: string): Task {
    const existing = changed.get(id);
    if (existing) return existing;
    const task = this.store.read(id);
    if (!task) {
      throw new Error(`Task #${id} disappeared while locked`);
    }
    changed.set(id, task);
    return task;
  }

  private async writeAll(changed: Map<string, Task>): Promise<void> {
    const now = Date.now();
    for (const task of changed.values()) {
      task.updatedAt = now;
    }
    await this.store.writeMany([...changed.values()]);
  }

  private dependentsOf(id: string): string[] {
    return this.store
      .list()
      .filter((task) => task.id !== id && task.blockedBy.includes(id))
      .map((task) => task.id);
  }

  private blockersOf(id: string): string[] {
    return this.store
      .list()
      .filter((task) => task.id !== id && task.blocks.includes(id))
      .map((task) => task.id);
  }

  /**
   * Lock every id `collect` names, then confirm the set did not grow while
   * waiting; if it did, release and try again with the larger set.
   */
  private async withTaskLocks<T>(collect: () => Set<string>, fn: () => Promise<T>): Promise<T> {
    for (;;) {
      const keys = collect();
      const outcome = await this.locks.withLocks(keys, async (): Promise<typeof RETRY | { value: T }> => {
        for (const key of collect()) {
          if (!keys.has(key)) return RETRY;
        }
        return { value: await fn() };
      });
      if (outcome !== RETRY) {
        return outcome.value;
      }
    }
  }
}

const sharedGraphs = new Map<string, Promise<TaskGraph>>();

/**
 * One graph per directory within the process, so sessions and sub-agents
 * bound to the same task list share its locks and index.
 */
export function openTaskGraph(dir: string, options?: TaskGraphOptions): Promise<TaskGraph> {
  const key = resolve(dir);
  let graph = sharedGraphs.get(key);
  if (!graph) {
    graph = TaskGraph.open(key, options).catch((error: unknown) => {
      sharedGraphs.delete(key);
      throw error;
    });
    sharedGraphs.set(key, graph);
  }
  return graph;
}
