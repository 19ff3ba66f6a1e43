/**
 * Error types raised inside the pipeline.
 * None of them escape the orchestrator; they end up as counters and messages.
 */

export class SourceFetchError extends Error {
  constructor(
    readonly source: string,
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'SourceFetchError';
  }
}

export class ValidationError extends Error {
  constructor(readonly field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ClassifierUnavailableError extends Error {
  constructor(message: string, readonly timedOut: boolean = false) {
    super(message);
    this.name = 'ClassifierUnavailableError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
