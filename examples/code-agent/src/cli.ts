/**
 * CLI interaction logic for the code agent
 */

import readline from 'readline';
import {
  createProfileRegistry,
  createProvider,
  createSessionContext,
  errorMessage,
  logger,
  openTaskGraph,
  PROFILES,
  ReActLoop,
  resolveTaskListId,
  taskListDir,
  type ConversationMessage,
  type LLMProvider,
  type ProfileName,
  type ReActStreamEvent,
  type StepwiseConfig,
  type TaskGraph,
  type ToolContext,
} from '@stepwise/core';
import {
  printAssistantPrefix,
  printError,
  printGoodbye,
  printHeader,
  printInfo,
  printToolCall,
  printToolResult,
  printUserPrompt,
  isCommand,
  parseCommand,
} from './utils.js';
import { executeCommand } from './commands.js';

function systemPrompt(cwd: string): string {
  return `You are a coding agent working in ${cwd}.

Use the tools you have to act; do not ask for permission before using them.
Break multi-step work into tasks or todos, keep exactly one item in progress,
and mark items completed as soon as they are done.
Be concise but thorough in your responses.`;
}

/** CLI class managing the interactive session */
export class CLI {
  private rl: readline.Interface;
  private provider: LLMProvider | null = null;
  private taskGraph: TaskGraph | undefined;
  private context: ToolContext;
  private history: ConversationMessage[] = [];
  private abortController: AbortController | null = null;
  private isRunning = false;
  private readonly cwd = process.cwd();

  constructor(
    private readonly config: StepwiseConfig,
    private profile: ProfileName
  ) {
    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    this.context = this.newContext();

    // Handle Ctrl+C
    this.rl.on('SIGINT', () => {
      this.handleSigint();
    });
  }

  /** Initialize and start the CLI */
  async start(): Promise<void> {
    logger.setLevel(this.config.logLevel);
    printHeader(this.profile, resolveTaskListId(this.config));

    try {
      this.provider = createProvider({
        model: this.config.model,
        provider: this.config.provider,
        apiKeys: this.config.apiKeys,
        baseURL: this.config.baseURL,
      });
      this.taskGraph = await openTaskGraph(taskListDir(this.config), {
        defaultActor: this.config.actor,
      });
    } catch (error) {
      printError(`Failed to start: ${errorMessage(error)}`);
      process.exit(1);
    }

    this.context = this.newContext();
    printInfo('Type /help for available commands, or just start chatting!');
    console.log();

    this.isRunning = true;
    this.runLoop();
  }

  /** Main input loop */
  private runLoop(): void {
    if (!this.isRunning) return;

    printUserPrompt();

    this.rl.question('', (input) => {
      this.handleInput(input.trim()).then(
        () => this.runLoop(),
        (error: unknown) => {
          printError(errorMessage(error));
          this.runLoop();
        }
      );
    });
  }

  private async handleInput(input: string): Promise<void> {
    if (!this.isRunning || !input) return;

    if (isCommand(input)) {
      const { command, args } = parseCommand(input);
      const shouldContinue = executeCommand(command, args, {
        taskGraph: this.taskGraph,
        todos: this.context.todos,
        profile: this.profile,
        setProfile: (profile) => {
          this.profile = profile;
          this.context = this.newContext();
        },
        clearHistory: () => {
          this.history = [];
          this.context = this.newContext();
        },
      });

      if (!shouldContinue) {
        this.shutdown();
      }
      return;
    }

    await this.handleMessage(input);
  }

  /** Run one prompt through the loop, rendering events as they arrive */
  private async handleMessage(message: string): Promise<void> {
    const provider = this.provider;
    if (!provider) {
      printError('No provider configured');
      return;
    }

    const context = this.context;
    this.abortController = new AbortController();
    context.abortController = this.abortController;

    const profile = PROFILES[this.profile];
    const loop = new ReActLoop(provider, createProfileRegistry(profile.name), {
      maxTurns: this.config.maxTurns,
      systemPrompt: systemPrompt(this.cwd),
      todoNag: profile.todoNag,
      context,
    });

    try {
      printAssistantPrefix();
      const stream = loop.runStream(message, this.history);
      for (;;) {
        const next = await stream.next();
        if (next.done) {
          this.history = next.value.messages;
          if (next.value.outcome === 'exhausted') {
            printInfo(`Stopped after ${next.value.turnCount} turns without a final answer`);
          } else if (next.value.outcome === 'aborted') {
            printInfo('Request cancelled');
          }
          break;
        }
        this.renderEvent(next.value);
      }
      console.log();
    } catch (error) {
      console.log();
      printError(`Error: ${errorMessage(error)}`);
    } finally {
      this.abortController = null;
      context.abortController = undefined;
    }
  }

  private renderEvent(event: ReActStreamEvent): void {
    switch (event.type) {
      case 'assistant':
        for (const block of event.message.message.content) {
          if (block.type === 'text') {
            console.log(block.text);
          } else {
            printToolCall(block.name, block.input);
          }
        }
        break;
      case 'tool_result':
        printToolResult(event.content, event.isError);
        break;
      case 'result':
        break;
    }
  }

  /** New session context: todos and background units start empty */
  private newContext(): ToolContext {
    const profile = PROFILES[this.profile];
    return createSessionContext({
      cwd: this.cwd,
      actor: this.config.actor,
      taskGraph: profile.tools.includes('TaskCreate') ? this.taskGraph : undefined,
    });
  }

  /** Handle Ctrl+C */
  private handleSigint(): void {
    if (this.abortController) {
      this.abortController.abort();
    } else {
      this.shutdown();
    }
  }

  /** Shutdown the CLI */
  private shutdown(): void {
    this.isRunning = false;
    this.rl.close();
    printGoodbye();
    process.exit(0);
  }
}
