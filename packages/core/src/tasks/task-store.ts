/**
 * Task store - one JSON record per task plus a persisted id high-watermark
 *
 * Layout of a task list directory:
 *   task_<id>.json   one record per task
 *   .highwatermark   highest id ever allocated, as a bare integer
 *
 * Records are indexed in memory when the store is opened; every write goes to
 * disk first and only then replaces the indexed copy. A multi-record write
 * stages every temp file before any record is replaced, so a failure leaves
 * all of them as they were.
 */

import { mkdir, readdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { Task } from '../types/task';
import { TaskStoreError, errorMessage } from '../errors';
import { logger } from '../utils/logger';
import { KeyedMutex } from './keyed-mutex';

export const HIGH_WATERMARK_FILE = '.highwatermark';

const TASK_FILE_PATTERN = /^task_(\d+)\.json$/;

const TaskRecordSchema = z.object({
  id: z.string().regex(/^\d+$/),
  subject: z.string(),
  description: z.string().default(''),
  status: z.enum(['pending', 'in_progress', 'completed']),
  activeForm: z.string().default(''),
  owner: z.string().default(''),
  metadata: z.record(z.string()).default({}),
  blocks: z.array(z.string()).default([]),
  blockedBy: z.array(z.string()).default([]),
  createdAt: z.number().default(0),
  updatedAt: z.number().default(0),
});

export function taskFileName(id: string): string {
  return `task_${id}.json`;
}

function tempPath(path: string): string {
  return `${path}.${process.pid}.tmp`;
}

function serialize(task: Task): string {
  return JSON.stringify(task, null, 2) + '\n';
}

interface StagedRecord {
  snapshot: Task;
  path: string;
  tmpPath: string;
}

function cloneTask(task: Task): Task {
  return {
    ...task,
    metadata: { ...task.metadata },
    blocks: [...task.blocks],
    blockedBy: [...task.blockedBy],
  };
}

export class TaskStore {
  private readonly records = new Map<string, Task>();
  private readonly allocatorLock = new KeyedMutex();
  private highWatermark = 0;

  private constructor(readonly dir: string) {}

  /**
   * Open (creating if needed) the task list stored in `dir`.
   * When no watermark file exists, allocation resumes after the largest id found.
   */
  static async open(dir: string): Promise<TaskStore> {
    const store = new TaskStore(dir);
    await store.load();
    return store;
  }

  /** Reserve the next id. Ids are never handed out twice, even after deletes. */
  async allocate(): Promise<string> {
    return this.allocatorLock.withLock(HIGH_WATERMARK_FILE, async () => {
      const next = this.highWatermark + 1;
      await this.writeAtomic(join(this.dir, HIGH_WATERMARK_FILE), `${next}\n`);
      this.highWatermark = next;
      return String(next);
    });
  }

  /** Highest id allocated so far (0 when none) */
  get watermark(): number {
    return this.highWatermark;
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  read(id: string): Task | undefined {
    const task = this.records.get(id);
    return task ? cloneTask(task) : undefined;
  }

  /** All records ordered by numeric id */
  list(): Task[] {
    return Array.from(this.records.values())
      .sort((a, b) => Number(a.id) - Number(b.id))
      .map(cloneTask);
  }

  async write(task: Task): Promise<void> {
    await this.writeMany([task]);
  }

  /** Replace several records together: either all of them change or none do */
  async writeMany(tasks: Task[]): Promise<void> {
    const staged: StagedRecord[] = [];
    for (const task of tasks) {
      const snapshot = cloneTask(task);
      const path = join(this.dir, taskFileName(task.id));
      const tmpPath = tempPath(path);
      try {
        await writeFile(tmpPath, serialize(snapshot), 'utf-8');
      } catch (error) {
        await this.discard(staged.map((entry) => entry.tmpPath));
        throw new TaskStoreError(`Failed to write ${path}: ${errorMessage(error)}`, path, {
          cause: error,
        });
      }
      staged.push({ snapshot, path, tmpPath });
    }

    let renamed = 0;
    for (const entry of staged) {
      try {
        await rename(entry.tmpPath, entry.path);
      } catch (error) {
        await this.discard(staged.slice(renamed).map((pending) => pending.tmpPath));
        await this.restore(staged.slice(0, renamed).map((done) => done.snapshot.id));
        throw new TaskStoreError(`Failed to write ${entry.path}: ${errorMessage(error)}`, entry.path, {
          cause: error,
        });
      }
      renamed++;
    }

    for (const entry of staged) {
      this.records.set(entry.snapshot.id, entry.snapshot);
    }
  }

  async remove(id: string): Promise<boolean> {
    if (!this.records.has(id)) {
      return false;
    }
    const path = join(this.dir, taskFileName(id));
    try {
      await rm(path, { force: true });
    } catch (error) {
      throw new TaskStoreError(`Failed to delete task #${id}: ${errorMessage(error)}`, path, {
        cause: error,
      });
    }
    this.records.delete(id);
    return true;
  }

  private async load(): Promise<void> {
    let entries: string[];
    try {
      await mkdir(this.dir, { recursive: true });
      entries = await readdir(this.dir);
    } catch (error) {
      throw new TaskStoreError(
        `Cannot open task list at ${this.dir}: ${errorMessage(error)}`,
        this.dir,
        { cause: error }
      );
    }

    let maxId = 0;
    for (const entry of entries) {
      const match = TASK_FILE_PATTERN.exec(entry);
      if (!match) continue;

      // Counted even when unreadable, so its id is never handed out again
      maxId = Math.max(maxId, Number(match[1]));
      const path = join(this.dir, entry);
      try {
        const parsed = TaskRecordSchema.safeParse(JSON.parse(await readFile(path, 'utf-8')));
        if (!parsed.success) {
          logger.warn('[TaskStore] Skipping malformed task record:', {
            path,
            issues: parsed.error.issues.map((issue) => issue.message),
          });
          continue;
        }
        this.records.set(parsed.data.id, parsed.data);
      } catch (error) {
        logger.warn('[TaskStore] Skipping unreadable task record:', {
          path,
          error: errorMessage(error),
        });
      }
    }

    const persisted = await this.readWatermark();
    // Never below the largest id on disk
    this.highWatermark = Math.max(persisted ?? 0, maxId);

    logger.debug('[TaskStore] Opened task list:', {
      dir: this.dir,
      tasks: this.records.size,
      highWatermark: this.highWatermark,
    });
  }

  private async readWatermark(): Promise<number | undefined> {
    const path = join(this.dir, HIGH_WATERMARK_FILE);
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw new TaskStoreError(`Cannot read ${path}: ${errorMessage(error)}`, path, {
        cause: error,
      });
    }

    const value = Number.parseInt(raw.trim(), 10);
    if (!Number.isInteger(value) || value < 0) {
      logger.warn('[TaskStore] Ignoring invalid high-watermark:', { path, raw });
      return undefined;
    }
    return value;
  }

  private async discard(tmpPaths: string[]): Promise<void> {
    const results = await Promise.allSettled(tmpPaths.map((tmpPath) => rm(tmpPath, { force: true })));
    for (const [index, result] of results.entries()) {
      if (result.status === 'rejected') {
        logger.warn('[TaskStore] Could not remove staged record:', {
          path: tmpPaths[index],
          error: errorMessage(result.reason),
        });
      }
    }
  }

  /** Put the indexed copy of each id back on disk after a partial rename */
  private async restore(ids: string[]): Promise<void> {
    for (const id of ids) {
      const path = join(this.dir, taskFileName(id));
      const previous = this.records.get(id);
      try {
        if (previous) {
          await this.writeAtomic(path, serialize(previous));
        } else {
          await rm(path, { force: true });
        }
      } catch (error) {
        logger.error('[TaskStore] Could not roll back task record:', { path, error: errorMessage(error) });
      }
    }
  }

  private async writeAtomic(path: string, content: string): Promise<void> {
    const tmpPath = tempPath(path);
    try {
      await writeFile(tmpPath, content, 'utf-8');
      await rename(tmpPath, path);
    } catch (error) {
      throw new TaskStoreError(`Failed to write ${path}: ${errorMessage(error)}`, path, {
        cause: error,
      });
    }
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
