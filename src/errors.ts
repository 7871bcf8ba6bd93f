export type ErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_STATE_TRANSITION'
  | 'VALIDATION_ERROR'
  | 'TRANSIENT_STORE_ERROR';

export class PipelineError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class NotFoundError extends PipelineError {
  constructor(resource: 'campaign' | 'recipient' | 'group', id: number | string) {
    super('NOT_FOUND', `${resource} ${id} not found`, { resource, id });
  }
}

export class InvalidStateTransitionError extends PipelineError {
  constructor(campaignId: number, from: string, to: string) {
    super('INVALID_STATE_TRANSITION', `campaign ${campaignId} cannot move from ${from} to ${to}`, {
      campaignId,
      from,
      to,
    });
  }
}

export class ValidationError extends PipelineError {
  constructor(message: string, field?: string) {
    super('VALIDATION_ERROR', message, field ? { field } : {});
  }
}

/** The persistence layer is unreachable; the job should be redelivered. */
export class TransientStoreError extends PipelineError {
  constructor(operation: string, cause: unknown) {
    super('TRANSIENT_STORE_ERROR', `${operation} failed: ${errorMessage(cause)}`, { operation });
    this.cause = cause;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Errors that redelivery cannot fix. */
export function isTerminalError(error: unknown): boolean {
  return (
    error instanceof NotFoundError ||
    error instanceof InvalidStateTransitionError ||
    error instanceof ValidationError
  );
}
