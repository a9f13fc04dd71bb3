/**
 * Session context - state shared by every tool dispatch within one loop run
 */

import { randomUUID } from 'crypto';
import type { TaskGraph } from '../tasks/task-graph';
import type { ToolContext } from '../types/tools';
import { TodoManager } from '../todos/todo-manager';
import { BackgroundTracker } from './background';

export interface SessionContextOptions {
  sessionId?: string;
  /** Working directory tools operate in (default: process.cwd()) */
  cwd?: string;
  env?: Record<string, string>;
  /** Identity recorded as task owner (default: 'agent') */
  actor?: string;
  taskGraph?: TaskGraph;
  abortController?: AbortController;
}

export function createSessionContext(options: SessionContextOptions = {}): ToolContext {
  return {
    sessionId: options.sessionId ?? randomUUID(),
    cwd: options.cwd ?? process.cwd(),
    env: options.env ?? {},
    actor: options.actor ?? 'agent',
    taskGraph: options.taskGraph,
    todos: new TodoManager(),
    background: new BackgroundTracker(),
    abortController: options.abortController,
  };
}
