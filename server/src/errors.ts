import type { StartErrorCode } from '../../shared/discussion.js';

/** A record the caller asked for does not exist. */
export class NotFoundError extends Error {
  readonly code = 'not_found';

  constructor(kind: string, id: number) {
    super(`${kind} ${id} not found`);
    this.name = 'NotFoundError';
  }
}

/** The request conflicts with the record's current state (e.g. editing a running discussion). */
export class ConflictError extends Error {
  readonly code = 'conflict';

  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

/**
 * Raised synchronously by `DiscussionRunEngine.start()` when a run cannot
 * begin. Never retried automatically.
 */
export class RunPreconditionError extends Error {
  readonly code: StartErrorCode;

  constructor(code: StartErrorCode, message: string) {
    super(message);
    this.name = 'RunPreconditionError';
    this.code = code;
  }
}

export interface StrategyAttempt {
  strategy: string;
  outcome: 'skipped' | 'failed' | 'timed_out' | 'malformed' | 'succeeded';
  reason?: string;
  durationMs: number;
}

/** Every available generation strategy failed. */
export class GenerationFailed extends Error {
  readonly attempts: StrategyAttempt[];

  constructor(reason: string, attempts: StrategyAttempt[]) {
    super(reason);
    this.name = 'GenerationFailed';
    this.attempts = attempts;
  }
}

export class StrategyTimeoutError extends Error {
  constructor(strategy: string, timeoutMs: number) {
    super(`${strategy} did not finish within ${timeoutMs}ms`);
    this.name = 'StrategyTimeoutError';
  }
}

/** A strategy returned output that cannot be used as a discussion transcript. */
export class MalformedOutputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedOutputError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
