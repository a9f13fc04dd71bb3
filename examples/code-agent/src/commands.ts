/**
 * Slash commands for the code agent CLI
 */

import chalk from 'chalk';
import { isProfileName, PROFILE_NAMES, type ProfileName, type TaskGraph, type TodoManager } from '@stepwise/core';
import { formatTaskRow, printError, printHelp, printInfo, printSuccess } from './utils.js';

export interface CommandContext {
  taskGraph?: TaskGraph;
  todos: TodoManager;
  profile: ProfileName;
  setProfile: (profile: ProfileName) => void;
  clearHistory: () => void;
}

/**
 * Execute a slash command.
 * @returns false when the CLI should exit
 */
export function executeCommand(command: string, args: string[], context: CommandContext): boolean {
  switch (command) {
    case '/help':
      printHelp();
      return true;

    case '/exit':
    case '/quit':
      return false;

    case '/tasks': {
      if (!context.taskGraph) {
        printInfo('No task list is open');
        return true;
      }
      const tasks = context.taskGraph.listAll();
      if (tasks.length === 0) {
        printInfo('No tasks');
        return true;
      }
      for (const task of tasks) {
        console.log('  ' + formatTaskRow(task));
      }
      return true;
    }

    case '/todos':
      console.log(chalk.gray(context.todos.render()));
      return true;

    case '/profile': {
      const name = args[0];
      if (!name) {
        printInfo(`Current profile: ${context.profile}`);
        return true;
      }
      if (!isProfileName(name)) {
        printError(`Unknown profile: ${name}. Available: ${PROFILE_NAMES.join(', ')}`);
        return true;
      }
      context.setProfile(name);
      printSuccess(`Switched to profile ${name}`);
      return true;
    }

    case '/clear':
      context.clearHistory();
      printSuccess('Conversation history cleared');
      return true;

    default:
      printError(`Unknown command: ${command}. Type /help for available commands.`);
      return true;
  }
}
