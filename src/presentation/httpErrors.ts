import { NavigatorError, errorMessage } from '../core/errors.js';
import type { ErrorCode } from '../core/errors.js';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  VALIDATION_ERROR: 400,
  UNKNOWN_MOOD: 400,
  INDEX_OUT_OF_RANGE: 404,
  SESSION_NOT_FOUND: 404,
  STORAGE_ERROR: 500,
  CONFIGURATION_ERROR: 500,
  BOUNDARY_ERROR: 502,
};

export interface ErrorBody {
  success: false;
  error: string;
  code?: ErrorCode;
}

/**
 * HTTP status and JSON body for anything a handler threw
 */
export function toHttpError(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof NavigatorError) {
    return {
      status: STATUS_BY_CODE[error.code],
      body: { success: false, error: error.message, code: error.code },
    };
  }
  return { status: 500, body: { success: false, error: errorMessage(error) } };
}
