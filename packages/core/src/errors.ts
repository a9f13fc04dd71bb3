/**
 * Error classes for Stepwise
 *
 * Tool failures, missing tasks and rejected updates never surface as these;
 * they travel as data. These are for misuse of the library itself.
 */

/** Base class for all Stepwise errors */
export class StepwiseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StepwiseError';
  }
}

/** Thrown when environment or option values fail validation */
export class ConfigError extends StepwiseError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Thrown when a task list directory cannot be read or written */
export class TaskStoreError extends StepwiseError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message);
    this.name = 'TaskStoreError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/** Thrown when no provider can be built for the requested model */
export class ProviderError extends StepwiseError {
  constructor(message: string) {
    super(message);
    this.name = 'ProviderError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
