// Standardized success and error responses returned by store operations
import { MemoryError } from './errors.js';

export type SuccessResponse<T extends object = {}> = { success: true } & T;

export type ErrorResponse = {
  success: false;
  /** Short error category */
  error: string;
  /** Human-readable detail */
  message: string;
  /** Remediation hint */
  details?: string;
} & Record<string, unknown>;

export type MemoryResponse<T extends object = {}> = SuccessResponse<T> | ErrorResponse;

export function createSuccessResponse<T extends object>(fields: T): SuccessResponse<T> {
  return { ...fields, success: true as const };
}

export function createErrorResponse(
  error: string,
  message: string,
  details?: string,
  fields: Record<string, unknown> = {}
): ErrorResponse {
  const response: ErrorResponse = { success: false, error, message };
  if (details !== undefined) {
    response.details = details;
  }
  return { ...fields, ...response };
}

/**
 * Converts an expected failure into an error envelope.
 * Anything that is not a MemoryError is a programming error and is re-thrown.
 */
export function toErrorResponse(error: unknown, fields: Record<string, unknown> = {}): ErrorResponse {
  if (error instanceof MemoryError) {
    return createErrorResponse(error.category, error.message, error.details, fields);
  }
  throw error;
}
