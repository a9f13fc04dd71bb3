import { describe, it, expect } from 'vitest';
import { join } from 'path';
import {
  DEFAULT_TASK_LIST_ID,
  resolveTaskListId,
  sanitizeListId,
  taskListDir,
} from '../../src/tasks/task-list-resolver';

describe('resolveTaskListId', () => {
  it('should prefer the explicit override', () => {
    expect(resolveTaskListId({ taskListId: 'sprint-12', teamName: 'platform' })).toBe('sprint-12');
  });

  it('should fall back to the team name', () => {
    expect(resolveTaskListId({ teamName: 'platform' })).toBe('platform');
  });

  it('should fall back to the default list', () => {
    expect(resolveTaskListId({})).toBe(DEFAULT_TASK_LIST_ID);
    expect(DEFAULT_TASK_LIST_ID).toBe('default');
  });

  it('should treat empty values as absent', () => {
    expect(resolveTaskListId({ taskListId: '', teamName: 'platform' })).toBe('platform');
    expect(resolveTaskListId({ taskListId: '', teamName: '' })).toBe('default');
  });
});

describe('sanitizeListId', () => {
  it('should keep safe ids unchanged', () => {
    expect(sanitizeListId('team_a.v2-final')).toBe('team_a.v2-final');
  });

  it('should replace path separators and spaces', () => {
    expect(sanitizeListId('team alpha/beta')).toBe('team-alpha-beta');
  });

  it('should never produce a parent directory reference', () => {
    expect(sanitizeListId('../evil')).toBe('-evil');
    expect(sanitizeListId('..')).toBe('default');
  });
});

describe('taskListDir', () => {
  it('should place each list under <home>/tasks', () => {
    expect(taskListDir({ home: '/srv/stepwise', teamName: 'platform' })).toBe(
      join('/srv/stepwise', 'tasks', 'platform')
    );
    expect(taskListDir({ home: '/srv/stepwise' })).toBe(join('/srv/stepwise', 'tasks', 'default'));
  });
});
