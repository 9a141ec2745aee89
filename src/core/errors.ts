/**
 * Error taxonomy shared by every layer.
 *
 * Each error carries a stable `code` so the HTTP and MCP surfaces can map it
 * without `instanceof` chains of their own.
 */
export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNKNOWN_MOOD'
  | 'INDEX_OUT_OF_RANGE'
  | 'STORAGE_ERROR'
  | 'BOUNDARY_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'SESSION_NOT_FOUND';

export class NavigatorError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends NavigatorError {
  constructor(message: string, public readonly field?: string) {
    super('VALIDATION_ERROR', message);
  }
}

export class UnknownMoodError extends NavigatorError {
  constructor(public readonly label: string) {
    super('UNKNOWN_MOOD', `Unknown mood label: ${label}`);
  }
}

export class IndexOutOfRangeError extends NavigatorError {
  constructor(public readonly index: number, public readonly length: number) {
    super('INDEX_OUT_OF_RANGE', `Index ${index} is out of range for a history of ${length} messages`);
  }
}

export class StorageError extends NavigatorError {
  constructor(message: string, cause?: unknown) {
    super('STORAGE_ERROR', message, { cause });
  }
}

export class BoundaryError extends NavigatorError {
  constructor(message: string, cause?: unknown) {
    super('BOUNDARY_ERROR', message, { cause });
  }
}

export class ConfigurationError extends NavigatorError {
  constructor(message: string, public readonly issues: string[] = []) {
    super('CONFIGURATION_ERROR', message);
  }
}

export class SessionNotFoundError extends NavigatorError {
  constructor(public readonly sessionId: string) {
    super('SESSION_NOT_FOUND', `Session not found: ${sessionId}`);
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
