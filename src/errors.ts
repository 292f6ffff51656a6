export type ErrorCode =
  | 'InsufficientData'
  | 'TrainingDiverged'
  | 'ValidationFailed'
  | 'DeploymentFailed'
  | 'InvalidEvent'
  | 'AnalysisTimeout'
  | 'AlreadyRunning'
  | 'Cancelled'
  | 'NotFound'
  | 'InvalidTransition'
  | 'BlobNotFound'
  | 'BlobCorrupted'
  | 'ChecksumMismatch'
  | 'TransferFailed'
  | 'InvalidSnapshot'
  | 'InvalidArgument';

const DEFAULT_REASONS: Record<ErrorCode, string> = {
  InsufficientData: 'Not enough usable training data',
  TrainingDiverged: 'Training loss became non-finite',
  ValidationFailed: 'Model failed validation',
  DeploymentFailed: 'Model deployment failed',
  InvalidEvent: 'Event submission is malformed',
  AnalysisTimeout: 'Deep analysis timed out',
  AlreadyRunning: 'A job is already running for this camera',
  Cancelled: 'Cancelled',
  NotFound: 'Not found',
  InvalidTransition: 'Invalid state transition',
  BlobNotFound: 'Blob not found',
  BlobCorrupted: 'Blob is corrupted',
  ChecksumMismatch: 'Checksum mismatch',
  TransferFailed: 'Transfer failed',
  InvalidSnapshot: 'Snapshot is invalid',
  InvalidArgument: 'Request is invalid'
};

const RETRYABLE_BY_DEFAULT = new Set<ErrorCode>(['TransferFailed', 'ChecksumMismatch']);

const TRANSIENT_ERRNO = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH'
]);

export type SentinelErrorOptions = {
  details?: Record<string, unknown>;
  retryable?: boolean;
  cause?: unknown;
};

export class SentinelError extends Error {
  readonly code: ErrorCode;
  readonly reason: string;
  readonly details: Record<string, unknown> | undefined;
  readonly retryable: boolean;

  constructor(code: ErrorCode, reason?: string, options: SentinelErrorOptions = {}) {
    const resolvedReason = reason && reason.trim() ? reason : DEFAULT_REASONS[code];
    super(`${code}: ${resolvedReason}`, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SentinelError';
    this.code = code;
    this.reason = resolvedReason;
    this.details = options.details;
    this.retryable = options.retryable ?? RETRYABLE_BY_DEFAULT.has(code);
  }

  toJSON() {
    return { error: this.code, reason: this.reason, ...(this.details ? { details: this.details } : {}) };
  }
}

export function isSentinelError(value: unknown, code?: ErrorCode): value is SentinelError {
  if (!(value instanceof SentinelError)) {
    return false;
  }
  return code === undefined || value.code === code;
}

export function toDisplayReason(error: unknown): string {
  if (isSentinelError(error)) {
    return error.reason;
  }
  return 'Internal error';
}

export function isTransient(error: unknown): boolean {
  if (isSentinelError(error)) {
    return error.retryable;
  }
  if (error instanceof Error) {
    const code = 'code' in error ? error.code : undefined;
    return typeof code === 'string' && TRANSIENT_ERRNO.has(code);
  }
  return false;
}

export function toErrorPayload(error: unknown): { error: ErrorCode | 'Internal'; reason: string } {
  if (isSentinelError(error)) {
    return { error: error.code, reason: error.reason };
  }
  return { error: 'Internal', reason: toDisplayReason(error) };
}
