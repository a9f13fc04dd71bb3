/**
 * Bash tool - Execute shell commands with timeout and background support
 */

import { spawn } from 'child_process';
import { z } from 'zod';
import type { Tool, ToolContext, JSONSchema } from '../types/tools';

export const DEFAULT_BASH_TIMEOUT_MS = 30_000;
const MAX_TIMEOUT_MS = 600_000;

/** Raw output cap, applied before the loop's own per-result cap */
export const MAX_BASH_OUTPUT_CHARS = 50_000;

const KILL_GRACE_MS = 2000;
const STOP_POLL_MS = 200;

const inputSchema = z.object({
  command: z.string(),
  timeout: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
  description: z.string().optional(),
  run_in_background: z.boolean().optional(),
});

export type BashInput = z.infer<typeof inputSchema>;

export interface BashOutput {
  output: string;
  exitCode: number;
  killed?: boolean;
  /** Background unit id when run_in_background was set */
  taskId?: string;
  error?: string;
}

const parameters: JSONSchema = {
  type: 'object',
  properties: {
    command: {
      type: 'string',
      description: 'Shell command to execute',
    },
    timeout: {
      type: 'number',
      description: `Maximum execution time in milliseconds (default ${DEFAULT_BASH_TIMEOUT_MS}, max ${MAX_TIMEOUT_MS})`,
    },
    description: {
      type: 'string',
      description: 'Brief description of the command (5-10 words)',
    },
    run_in_background: {
      type: 'boolean',
      description: 'Run the command in the background; poll it with TaskOutput',
    },
  },
  required: ['command'],
};

interface CommandResult {
  output: string;
  truncated: boolean;
  exitCode: number;
  timedOut: boolean;
  aborted: boolean;
  stopped: boolean;
  spawnError?: string;
}

interface RunOptions {
  cwd: string;
  env: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
  isStopped?: () => boolean;
}

const TRUNCATED_NOTICE = `\n[Output truncated to ${MAX_BASH_OUTPUT_CHARS} characters]`;

function appendCapped(current: string, chunk: string): { value: string; truncated: boolean } {
  if (current.length >= MAX_BASH_OUTPUT_CHARS) {
    return { value: current, truncated: true };
  }
  const remaining = MAX_BASH_OUTPUT_CHARS - current.length;
  if (chunk.length <= remaining) {
    return { value: current + chunk, truncated: false };
  }
  return { value: current + chunk.slice(0, remaining), truncated: true };
}

/** Run one command to completion; never rejects */
function runCommand(command: string, options: RunOptions): Promise<CommandResult> {
  return new Promise((resolve) => {
    const isWindows = process.platform === 'win32';
    const shell = isWindows ? 'cmd.exe' : '/bin/sh';
    const shellFlag = isWindows ? '/c' : '-c';

    // Own process group, so a kill reaches every process the command started
    const child = spawn(shell, [shellFlag, command], {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: !isWindows,
    });

    let output = '';
    let truncated = false;
    let timedOut = false;
    let aborted = false;
    let stopped = false;
    let forceKill: NodeJS.Timeout | undefined;

    const signalAll = (signal: NodeJS.Signals) => {
      if (isWindows || child.pid === undefined) {
        child.kill(signal);
        return;
      }
      try {
        process.kill(-child.pid, signal);
      } catch {
        // Group already gone; the shell itself may still be exiting
        child.kill(signal);
      }
    };

    const terminate = () => {
      signalAll('SIGTERM');
      forceKill = setTimeout(() => signalAll('SIGKILL'), KILL_GRACE_MS);
    };

    const capture = (data: Buffer) => {
      const next = appendCapped(output, data.toString());
      output = next.value;
      if (next.truncated) truncated = true;
    };
    child.stdout?.on('data', capture);
    child.stderr?.on('data', capture);

    const timeoutId = options.timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          terminate();
        }, options.timeoutMs)
      : undefined;

    const stopPoll = options.isStopped
      ? setInterval(() => {
          if (!stopped && options.isStopped?.()) {
            stopped = true;
            terminate();
          }
        }, STOP_POLL_MS)
      : undefined;

    const abortHandler = () => {
      aborted = true;
      terminate();
    };
    options.signal?.addEventListener('abort', abortHandler);

    const cleanup = () => {
      clearTimeout(timeoutId);
      clearInterval(stopPoll);
      clearTimeout(forceKill);
      options.signal?.removeEventListener('abort', abortHandler);
    };

    child.on('close', (code) => {
      cleanup();
      resolve({
        output,
        truncated,
        exitCode: code ?? -1,
        timedOut,
        aborted,
        stopped,
      });
    });

    child.on('error', (err) => {
      cleanup();
      resolve({
        output,
        truncated,
        exitCode: -1,
        timedOut,
        aborted,
        stopped,
        spawnError: `Failed to execute command: ${err.message}`,
      });
    });
  });
}

function formatOutput(result: CommandResult): string {
  const trimmed = result.output.trim();
  if (trimmed === '') return '(empty)';
  return result.truncated ? trimmed + TRUNCATED_NOTICE : trimmed;
}

export class BashTool implements Tool<BashInput, BashOutput> {
  name = 'bash' as const;
  description =
    'Run a shell command in the working directory and return stdout+stderr. Supports a timeout and background execution.';
  parameters = parameters;
  inputSchema = inputSchema;

  handler = async (input: BashInput, context: ToolContext): Promise<BashOutput> => {
    const { command, timeout = DEFAULT_BASH_TIMEOUT_MS, run_in_background } = input;

    if (!command.trim()) {
      return { output: '(empty)', exitCode: 0 };
    }

    if (context.abortController?.signal.aborted) {
      return { output: '', exitCode: -1, killed: true, error: 'Command aborted before execution' };
    }

    if (run_in_background) {
      const unit = context.background.start(input.description ?? command, async (isStopped) => {
        const result = await runCommand(command, {
          cwd: context.cwd,
          env: context.env,
          isStopped,
        });
        return {
          output: result.spawnError ?? formatOutput(result),
          exitCode: result.exitCode,
        };
      });
      return {
        output: `Started background task ${unit.id}: ${command}`,
        exitCode: 0,
        taskId: unit.id,
      };
    }

    const result = await runCommand(command, {
      cwd: context.cwd,
      env: context.env,
      timeoutMs: timeout,
      signal: context.abortController?.signal,
    });

    if (result.spawnError) {
      return { output: '', exitCode: -1, error: result.spawnError };
    }
    if (result.aborted) {
      return { output: formatOutput(result), exitCode: -1, killed: true, error: 'Command aborted' };
    }
    if (result.timedOut) {
      return {
        output: formatOutput(result),
        exitCode: -1,
        killed: true,
        error: `Command timed out after ${timeout}ms`,
      };
    }

    return { output: formatOutput(result), exitCode: result.exitCode };
  };
}

// Export singleton instance
export const bashTool = new BashTool();
