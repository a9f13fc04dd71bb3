/**
 * Task list resolution - decides which task list directory a session binds to
 */

import { join } from 'path';
import type { StepwiseConfig } from '../config';

export const DEFAULT_TASK_LIST_ID = 'default';

export interface TaskListSource {
  /** Explicit override (STEPWISE_TASK_LIST_ID) */
  taskListId?: string;
  /** Team or group name (STEPWISE_TEAM_NAME) */
  teamName?: string;
}

/**
 * Pick the active task list id: explicit override, then team name, then
 * the default list.
 */
export function resolveTaskListId(source: TaskListSource): string {
  return source.taskListId || source.teamName || DEFAULT_TASK_LIST_ID;
}

/** Directory holding the resolved task list, `<home>/tasks/<id>` */
export function taskListDir(config: Pick<StepwiseConfig, 'home' | 'taskListId' | 'teamName'>): string {
  return join(config.home, 'tasks', sanitizeListId(resolveTaskListId(config)));
}

/** Keep list ids usable as a single path segment */
export function sanitizeListId(id: string): string {
  const cleaned = id.replace(/[^A-Za-z0-9._-]/g, '-').replace(/^\.+/, '');
  return cleaned === '' ? DEFAULT_TASK_LIST_ID : cleaned;
}
