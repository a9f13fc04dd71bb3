import { describe, it, expect } from 'vitest';
import {
  AGENT_TYPE_NAMES,
  PROFILES,
  PROFILE_NAMES,
  getToolsForAgent,
  isProfileName,
} from '../../src/agent/profiles';
import { createProfileRegistry } from '../../src/tools/registry';

describe('capability profiles', () => {
  it('should grow the tool set stage by stage', () => {
    expect(PROFILES.bash.tools).toEqual(['bash']);
    expect(PROFILES.tools.tools).toEqual(['bash', 'read_file', 'write_file', 'edit_file']);
    expect(PROFILES.todo.tools).toContain('TodoWrite');
    expect(PROFILES.subagent.tools).toContain('Task');
    expect(PROFILES.tasks.tools).toEqual(
      expect.arrayContaining(['TaskCreate', 'TaskGet', 'TaskUpdate', 'TaskList', 'TaskOutput', 'TaskStop'])
    );
  });

  it('should only nag in the todo stages', () => {
    const nagging = PROFILE_NAMES.filter((name) => PROFILES[name].todoNag);
    expect(nagging).toEqual(['todo', 'subagent']);
  });

  it('should build a registry with exactly the profile tools', () => {
    expect(createProfileRegistry('todo').names()).toEqual([
      'bash',
      'read_file',
      'write_file',
      'edit_file',
      'TodoWrite',
    ]);
  });

  it('should recognise profile names', () => {
    expect(isProfileName('tasks')).toBe(true);
    expect(isProfileName('everything')).toBe(false);
  });
});

describe('sub-agent types', () => {
  it('should keep explore and plan read-only', () => {
    expect(getToolsForAgent('explore')).toEqual(['bash', 'read_file']);
    expect(getToolsForAgent('plan')).toEqual(['bash', 'read_file']);
    expect(getToolsForAgent('code')).toEqual(['bash', 'read_file', 'write_file', 'edit_file']);
  });

  it('should never grant the Task tool', () => {
    for (const type of AGENT_TYPE_NAMES) {
      expect(getToolsForAgent(type)).not.toContain('Task');
    }
  });
});
