#!/usr/bin/env tsx
/**
 * Stepwise Code Agent
 *
 * An interactive terminal agent on top of @stepwise/core:
 * - Capability profiles (bash, tools, todo, subagent, tasks)
 * - Persistent task list with dependencies
 * - Sub-agent delegation
 * - Cancel operations with Ctrl+C
 *
 * Run with:
 *   ANTHROPIC_API_KEY=... npm start
 *   npm start -- --profile todo
 */

import { isProfileName, loadConfig, type ProfileName } from '@stepwise/core';
import { CLI } from './cli.js';

function profileFromArgs(argv: string[]): ProfileName {
  const index = argv.indexOf('--profile');
  const value = index >= 0 ? argv[index + 1] : undefined;
  if (value === undefined) return 'tasks';
  if (!isProfileName(value)) {
    throw new Error(`Unknown profile: ${value}`);
  }
  return value;
}

async function main() {
  const cli = new CLI(loadConfig(), profileFromArgs(process.argv.slice(2)));
  await cli.start();
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
