/**
 * Utility functions for the code agent CLI
 */

import chalk from 'chalk';
import { PROFILES, type ProfileName, type Task } from '@stepwise/core';

/** Print a formatted header */
export function printHeader(profile: ProfileName, taskListId: string): void {
  console.log(chalk.cyan.bold('Stepwise Code Agent'));
  console.log(chalk.gray(`profile: ${profile}  task list: ${taskListId}`));
  console.log(chalk.gray('━'.repeat(50)));
  console.log();
}

/** Print the help message */
export function printHelp(): void {
  console.log(chalk.yellow.bold('Available Commands:'));
  console.log();
  console.log('  ' + chalk.green('/help') + '              Show this help message');
  console.log('  ' + chalk.green('/tasks') + '             List tasks in the active task list');
  console.log('  ' + chalk.green('/todos') + '             Show the session todo list');
  console.log('  ' + chalk.green('/profile <name>') + '    Switch capability profile');
  console.log('  ' + chalk.green('/clear') + '             Clear conversation history');
  console.log('  ' + chalk.green('/exit') + ' or ' + chalk.green('/quit') + '     Exit the program');
  console.log();
  console.log(chalk.yellow.bold('Profiles:'));
  for (const profile of Object.values(PROFILES)) {
    console.log('  ' + chalk.green(profile.name.padEnd(10)) + profile.description);
  }
  console.log();
  console.log(chalk.yellow.bold('Tips:'));
  console.log('  • Type any message to give the agent a task');
  console.log('  • Press Ctrl+C to cancel the current request');
  console.log();
}

/** Print a formatted user prompt */
export function printUserPrompt(): void {
  process.stdout.write(chalk.blue.bold('You: '));
}

/** Print the assistant's response prefix */
export function printAssistantPrefix(): void {
  console.log(chalk.magenta.bold('Assistant:'));
}

/** One-line rendering of a tool call's arguments */
export function formatToolArgs(input: unknown): string {
  if (typeof input !== 'object' || input === null) {
    return JSON.stringify(input) ?? '';
  }
  return Object.entries(input)
    .map(([k, v]) => `${k}=${truncate(JSON.stringify(v) ?? '', 60)}`)
    .join(', ');
}

/** Print a tool call */
export function printToolCall(name: string, input: unknown): void {
  console.log(chalk.gray(`  [Tool: ${name}(${formatToolArgs(input)})]`));
}

/** Print the first line of a tool result */
export function printToolResult(content: string, isError: boolean): void {
  const firstLine = truncate(content.split('\n')[0] ?? '', 100);
  console.log(isError ? chalk.red(`    ${firstLine}`) : chalk.gray(`    ${firstLine}`));
}

/** Print a success message */
export function printSuccess(message: string): void {
  console.log(chalk.green('✓ ') + message);
}

/** Print an error message */
export function printError(message: string): void {
  console.log(chalk.red('✗ ') + message);
}

/** Print an info message */
export function printInfo(message: string): void {
  console.log(chalk.yellow('ℹ ') + message);
}

const STATUS_MARKERS: Record<Task['status'], string> = {
  pending: '[ ]',
  in_progress: '[>]',
  completed: '[x]',
};

/** One row of the /tasks listing, without colour */
export function formatTaskRow(task: Task): string {
  const blocked = task.blockedBy.length > 0 ? ` (blocked by ${task.blockedBy.map((id) => `#${id}`).join(', ')})` : '';
  const owner = task.owner ? ` @${task.owner}` : '';
  return `${STATUS_MARKERS[task.status]} #${task.id} ${task.subject}${owner}${blocked}`;
}

/** Print goodbye message */
export function printGoodbye(): void {
  console.log();
  console.log(chalk.cyan('Goodbye!'));
}

/** Check if a string is a command */
export function isCommand(input: string): boolean {
  return input.startsWith('/');
}

/** Parse a command and its arguments */
export function parseCommand(input: string): { command: string; args: string[] } {
  const [first = '', ...args] = input.trim().split(/\s+/);
  return { command: first.toLowerCase(), args };
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}
