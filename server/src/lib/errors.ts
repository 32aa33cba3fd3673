import type { z } from 'zod';

export type PipelineErrorCode =
  | 'VALIDATION_FAILED'
  | 'QUEUE_FULL'
  | 'STAGE_FAILED'
  | 'SPEAKER_INPUT_INVALID'
  | 'PERSISTENCE_FAILED'
  | 'NOT_FOUND'
  | 'INVALID_JOB_STATE';

export type HttpErrorStatus = 400 | 404 | 409 | 429 | 502 | 503;

/**
 * Base class for every error the pipeline core raises on purpose.
 * Routes translate these into `{ error, code }` responses; anything else is a 500.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  abstract readonly status: HttpErrorStatus;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed submission, reorder, metadata or settings input. */
export class ValidationError extends PipelineError {
  readonly code = 'VALIDATION_FAILED';
  readonly status = 400;

  constructor(message: string, readonly issues: z.ZodIssue[] = []) {
    super(message);
  }
}

export class AdmissionError extends PipelineError {
  readonly code = 'QUEUE_FULL';
  readonly status = 429;

  constructor(readonly limit: number) {
    super(`Queue full (max ${limit} active jobs)`);
  }
}

/**
 * Raised by a stage collaborator. During execution the message is recorded
 * verbatim in the step log; from a post-completion action it is a 502.
 */
export class StageError extends PipelineError {
  readonly code = 'STAGE_FAILED';
  readonly status = 502;
}

export class SpeakerInputError extends PipelineError {
  readonly code = 'SPEAKER_INPUT_INVALID';
  readonly status = 400;
}

export class PersistenceError extends PipelineError {
  readonly code = 'PERSISTENCE_FAILED';
  readonly status = 503;
}

export class NotFoundError extends PipelineError {
  readonly code = 'NOT_FOUND';
  readonly status = 404;

  constructor(what = 'Job') {
    super(`${what} not found`);
  }
}

export class JobStateError extends PipelineError {
  readonly code = 'INVALID_JOB_STATE';
  readonly status = 409;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
