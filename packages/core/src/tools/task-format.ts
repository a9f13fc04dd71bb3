/**
 * Text rendering of tasks for tool results
 */

import type { Task } from '../types/task';

export const NO_TASK_LIST = 'No task list is bound to this session';

function idList(ids: string[]): string {
  return ids.map((id) => `#${id}`).join(', ');
}

/** One line per task: `#3 [pending] Write API (owner: alice) [blocked by #1, #2]` */
export function formatTaskLine(task: Task): string {
  let line = `#${task.id} [${task.status}] ${task.subject}`;
  if (task.owner) {
    line += ` (owner: ${task.owner})`;
  }
  if (task.blockedBy.length > 0) {
    line += ` [blocked by ${idList(task.blockedBy)}]`;
  }
  return line;
}

export function formatTaskDetails(task: Task): string {
  const lines = [
    `Task #${task.id}: ${task.subject}`,
    `Status: ${task.status}`,
    `Description: ${task.description}`,
  ];

  if (task.activeForm) {
    lines.push(`Active Form: ${task.activeForm}`);
  }
  if (task.owner) {
    lines.push(`Owner: ${task.owner}`);
  }
  if (task.blockedBy.length > 0) {
    lines.push(`Blocked By: ${idList(task.blockedBy)}`);
  }
  if (task.blocks.length > 0) {
    lines.push(`Blocks: ${idList(task.blocks)}`);
  }
  const metadata = Object.entries(task.metadata);
  if (metadata.length > 0) {
    lines.push(`Metadata: ${metadata.map(([key, value]) => `${key}=${value}`).join(', ')}`);
  }

  return lines.join('\n');
}
