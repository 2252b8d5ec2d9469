/**
 * Error types shared by the query pipeline. None of them escapes
 * `RagService.handleQuery`; they steer each stage onto its failure path.
 */

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export class StageTimeoutError extends Error {
  constructor(
    readonly stage: string,
    readonly timeoutMs: number,
  ) {
    super(`Stage "${stage}" timed out after ${timeoutMs}ms`);
    this.name = 'StageTimeoutError';
  }
}

export class RequestCancelledError extends Error {
  constructor(message = 'Request was cancelled by the client') {
    super(message);
    this.name = 'RequestCancelledError';
  }
}

/** A responder could not produce a usable draft. */
export class GenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GenerationError';
  }
}

export class ToolInvocationError extends Error {
  constructor(
    readonly toolId: string,
    message: string,
  ) {
    super(message);
    this.name = 'ToolInvocationError';
  }
}

export function isCancellation(error: unknown): error is RequestCancelledError {
  return error instanceof RequestCancelledError;
}
