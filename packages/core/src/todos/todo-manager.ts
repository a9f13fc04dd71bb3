/**
 * Todo list - the flat, in-session plan behind the TodoWrite tool
 *
 * Every update replaces the whole list. A list with more than MAX_TODO_ITEMS
 * entries, or more than one item in progress, is rejected as a whole and the
 * previous list stays in place.
 */

import type { TaskStatus } from '../types/task';
import { isTaskStatus } from '../types/task';

export const MAX_TODO_ITEMS = 20;

export interface TodoItem {
  content: string;
  status: TaskStatus;
  activeForm: string;
}

/** Raw item as the model sends it */
export interface TodoItemInput {
  content?: string;
  status?: string;
  activeForm?: string;
}

export type TodoUpdateResult =
  | { ok: true; rendered: string }
  | { ok: false; message: string };

const STATUS_MARKERS: Record<TaskStatus, string> = {
  pending: '[ ]',
  in_progress: '[>]',
  completed: '[x]',
};

export class TodoManager {
  private current: TodoItem[] = [];

  get items(): readonly TodoItem[] {
    return this.current;
  }

  update(items: TodoItemInput[]): TodoUpdateResult {
    if (items.length > MAX_TODO_ITEMS) {
      return { ok: false, message: `Max ${MAX_TODO_ITEMS} todos allowed, got ${items.length}` };
    }

    const validated: TodoItem[] = [];
    let inProgress = 0;

    for (const [index, item] of items.entries()) {
      const content = (item.content ?? '').trim();
      const activeForm = (item.activeForm ?? '').trim();
      const status = item.status ?? 'pending';

      if (!content) {
        return { ok: false, message: `Item ${index + 1}: content is required` };
      }
      if (!isTaskStatus(status)) {
        return { ok: false, message: `Item ${index + 1}: invalid status '${status}'` };
      }
      if (status === 'in_progress') {
        inProgress++;
      }

      validated.push({ content, status, activeForm: activeForm || content });
    }

    if (inProgress > 1) {
      return {
        ok: false,
        message: `Only one todo can be in_progress at a time, got ${inProgress}`,
      };
    }

    this.current = validated;
    return { ok: true, rendered: this.render() };
  }

  render(): string {
    if (this.current.length === 0) {
      return 'No todos.';
    }

    const lines = this.current.map((item) => {
      const line = `${STATUS_MARKERS[item.status]} ${item.content}`;
      return item.status === 'in_progress' ? `${line} <- ${item.activeForm}` : line;
    });
    const done = this.current.filter((item) => item.status === 'completed').length;

    return `${lines.join('\n')}\n\n(${done}/${this.current.length} completed)`;
  }

  clear(): void {
    this.current = [];
  }
}
