/**
 * Task type definitions for the task graph
 */

/** Task status values */
export type TaskStatus = 'pending' | 'in_progress' | 'completed';

export const TASK_STATUSES: readonly TaskStatus[] = ['pending', 'in_progress', 'completed'];

export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === 'string' && TASK_STATUSES.some((status) => status === value);
}

/** Task data structure, persisted as one JSON record per id */
export interface Task {
  id: string;
  subject: string;
  description: string;
  status: TaskStatus;
  /** Present continuous label shown while in_progress (e.g. "Running tests") */
  activeForm: string;
  /** Empty until the task is first started */
  owner: string;
  metadata: Record<string, string>;
  /** Ids this task prevents from starting */
  blocks: string[];
  /** Ids that must complete before this task may start */
  blockedBy: string[];
  createdAt: number;
  updatedAt: number;
}

export interface TaskCreateFields {
  subject: string;
  description?: string;
  activeForm?: string;
  metadata?: Record<string, string>;
}

export interface TaskUpdateFields {
  subject?: string;
  description?: string;
  activeForm?: string;
  status?: string;
  owner?: string;
  /** Merged into existing metadata; a null value removes the key */
  metadata?: Record<string, string | null>;
  addBlockedBy?: string[];
  addBlocks?: string[];
}

/** Outcome of a graph mutation; failures are values, never thrown */
export type TaskUpdateResult =
  | { ok: true; task: Task }
  | { ok: false; reason: 'not_found'; taskId: string }
  | { ok: false; reason: 'invalid'; message: string };
