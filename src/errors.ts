export type ContextSyncErrorCode =
  | 'SNAPSHOT_FAILED'
  | 'ENVELOPE_DECODE'
  | 'STAGE_ORDER'
  | 'MODEL_CALL'
  | 'INVALID_PATH'
  | 'CONNECTION_CLOSED';

export class ContextSyncError extends Error {
  readonly code: ContextSyncErrorCode;

  constructor(code: ContextSyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ContextSyncError';
    this.code = code;
  }
}

/** The root directory could not be walked. Per-entry failures never raise this. */
export class SnapshotError extends ContextSyncError {
  readonly rootDir: string;

  constructor(rootDir: string, cause: unknown) {
    super('SNAPSHOT_FAILED', `failed to walk directory (${rootDir}): ${errorMessage(cause)}`, { cause });
    this.name = 'SnapshotError';
    this.rootDir = rootDir;
  }
}

export class EnvelopeDecodeError extends ContextSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ENVELOPE_DECODE', message, options);
    this.name = 'EnvelopeDecodeError';
  }
}

export class StageOrderError extends ContextSyncError {
  constructor(message: string) {
    super('STAGE_ORDER', message);
    this.name = 'StageOrderError';
  }
}

export class ModelCallError extends ContextSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MODEL_CALL', message, options);
    this.name = 'ModelCallError';
  }
}

export class InvalidPathError extends ContextSyncError {
  constructor(message: string) {
    super('INVALID_PATH', message);
    this.name = 'InvalidPathError';
  }
}

export class ConnectionClosedError extends ContextSyncError {
  readonly closeCode: number;

  constructor(closeCode: number, reason: string) {
    super('CONNECTION_CLOSED', `connection closed (${closeCode})${reason ? `: ${reason}` : ''}`);
    this.name = 'ConnectionClosedError';
    this.closeCode = closeCode;
  }
}

/**
 * Checked by shape rather than `instanceof Error`: errors raised in another
 * realm (a vm context, Jest's sandbox) fail the prototype check.
 */
export function isErrorLike(value: unknown): value is { name: string; message: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

export function errorMessage(error: unknown): string {
  return isErrorLike(error) ? error.message : String(error);
}

/** The `code` of a Node.js system error (ENOENT, EACCES, ...), if any. */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
