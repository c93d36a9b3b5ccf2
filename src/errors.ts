export type ErrorKind =
  | 'RetryableToolError'
  | 'ToolCallFailed'
  | 'ConfigurationError'
  | 'PreconditionViolation'
  | 'DuplicateContentRejected'
  | 'RunExceededStepBudget'
  | 'RunTimedOut'
  | 'RunCanceled'
  | 'NoResearchFound'
  | 'EmptyDraft'
  | 'PublicationUnrecorded'
  | 'InternalError';

export type PreconditionCode =
  | 'PublishPreconditionFailed'
  | 'PublishOutcomeUnknown'
  | 'EmptyDraftForQuality'
  | 'MissingResearch';

/**
 * Base class for every failure the workflow knows how to classify. The
 * engine only retries errors whose `retryable` flag is set.
 */
export abstract class WorkflowError extends Error {
  abstract readonly kind: ErrorKind;
  readonly retryable: boolean = false;
  readonly code?: string;

  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options?.code;
  }

  toRecord(): { kind: string; message: string; code?: string } {
    return this.code === undefined
      ? { kind: this.kind, message: this.message }
      : { kind: this.kind, message: this.message, code: this.code };
  }
}

/** Transient provider or network failure. */
export class RetryableToolError extends WorkflowError {
  readonly kind = 'RetryableToolError';
  override readonly retryable = true;
}

/** A tool answered with an error that retrying will not fix. */
export class ToolCallFailed extends WorkflowError {
  readonly kind = 'ToolCallFailed';
}

export class ConfigurationError extends WorkflowError {
  readonly kind = 'ConfigurationError';
}

export class PreconditionViolation extends WorkflowError {
  readonly kind = 'PreconditionViolation';
  declare readonly code: PreconditionCode;

  constructor(code: PreconditionCode, message: string) {
    super(message, { code });
  }
}

export class DuplicateContentRejected extends WorkflowError {
  readonly kind = 'DuplicateContentRejected';
}

export class RunExceededStepBudget extends WorkflowError {
  readonly kind = 'RunExceededStepBudget';
}

export class RunTimedOut extends WorkflowError {
  readonly kind = 'RunTimedOut';
}

export class RunCanceled extends WorkflowError {
  readonly kind = 'RunCanceled';
}

export class NoResearchFound extends WorkflowError {
  readonly kind = 'NoResearchFound';
}

/** The writer's collaborator returned nothing usable; a new completion may. */
export class EmptyDraft extends WorkflowError {
  readonly kind = 'EmptyDraft';
  override readonly retryable = true;
}

/** Publish succeeded but its episodic record (and final checkpoint) could not be written. */
export class PublicationUnrecorded extends WorkflowError {
  readonly kind = 'PublicationUnrecorded';
}

export class InternalError extends WorkflowError {
  readonly kind = 'InternalError';
}

const TRANSIENT_PATTERNS = [
  /rate.?limit/i,
  /too.?many.?requests/i,
  /\b429\b/,
  /\b(?:status(?: code)?|error|HTTP)\W{0,2}5\d{2}\b/i,
  /network/i,
  /fetch failed/i,
  /ETIMEDOUT/,
  /ECONNRESET/,
  /ECONNREFUSED/,
  /socket.?hang.?up/i,
  /service.?unavailable/i,
  /overloaded/i,
  /temporarily/i,
];

/** True when an error message looks like a transient network or provider failure. */
export function isTransientError(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return TRANSIENT_PATTERNS.some((pattern) => pattern.test(message));
}

/** Normalise anything thrown by a node or collaborator into a WorkflowError. */
export function toWorkflowError(error: unknown): WorkflowError {
  if (error instanceof WorkflowError) return error;
  const message = error instanceof Error ? error.message : String(error);
  if (isTransientError(error)) {
    return new RetryableToolError(message, { cause: error });
  }
  return new InternalError(message, { cause: error });
}
