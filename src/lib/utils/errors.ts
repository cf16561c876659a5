/**
 * Error handling utilities with standardized error payloads
 */

import type { ErrorPayload } from "../../types.js";

/**
 * Standard error codes
 */
export enum ErrorCode {
  INVALID_INPUT = "INVALID_INPUT",
  INPUT_FORMAT_ERROR = "INPUT_FORMAT_ERROR",
  PARSE_ERROR = "PARSE_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  IO_ERROR = "IO_ERROR",
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

/**
 * Error thrown by the pipeline; carries the payload that is logged on exit
 */
export class PipelineError extends Error {
  readonly payload: ErrorPayload;

  constructor(payload: ErrorPayload, options?: { cause?: unknown }) {
    super(payload.message, options);
    this.name = "PipelineError";
    this.payload = payload;
  }

  get code(): string {
    return this.payload.code;
  }
}

/**
 * Create a standardized error payload
 */
export function createError(
  code: ErrorCode | string,
  message: string,
  details?: Record<string, unknown>
): ErrorPayload {
  return {
    code,
    message,
    details,
  };
}

/**
 * Create an error for invalid input (command-line usage, option values)
 */
export function invalidInputError(
  field: string,
  value: unknown,
  reason?: string
): ErrorPayload {
  return createError(
    ErrorCode.INVALID_INPUT,
    `Invalid input for ${field}: ${String(value)}${reason ? ` (${reason})` : ""}`,
    { field, value, reason }
  );
}

/**
 * Create an error for a record line that is not valid JSON or misses fields
 */
export function inputFormatError(
  file: string,
  line: number,
  reason?: string
): ErrorPayload {
  return createError(
    ErrorCode.INPUT_FORMAT_ERROR,
    `Malformed record at ${file}:${line}${reason ? `: ${reason}` : ""}`,
    {
      file,
      line,
      reason,
    }
  );
}

/**
 * Create an error for parsing failures
 */
export function parseError(
  operation: string,
  reason?: string,
  details?: Record<string, unknown>
): ErrorPayload {
  return createError(
    ErrorCode.PARSE_ERROR,
    `Parse error during ${operation}${reason ? `: ${reason}` : ""}`,
    {
      operation,
      reason,
      ...details,
    }
  );
}

/**
 * Create an error for configuration failures
 */
export function configError(reason: string): ErrorPayload {
  return createError(ErrorCode.CONFIG_ERROR, `Configuration error: ${reason}`, { reason });
}

/**
 * Create an error for file read/write failures
 */
export function ioError(
  operation: string,
  path: string,
  reason?: string
): ErrorPayload {
  return createError(
    ErrorCode.IO_ERROR,
    `I/O error during ${operation} of ${path}${reason ? `: ${reason}` : ""}`,
    {
      operation,
      path,
      reason,
    }
  );
}

/**
 * Create an error for internal/unexpected errors
 */
export function internalError(
  message: string,
  details?: Record<string, unknown>
): ErrorPayload {
  return createError(
    ErrorCode.INTERNAL_ERROR,
    `Internal error: ${message}`,
    details
  );
}

/**
 * Convert an Error object to a standardized error payload
 */
export function errorToPayload(error: unknown, context?: Record<string, unknown>): ErrorPayload {
  if (error instanceof PipelineError) {
    return error.payload;
  }

  if (error instanceof Error) {
    return createError(
      ErrorCode.INTERNAL_ERROR,
      error.message,
      {
        name: error.name,
        stack: error.stack,
        ...context,
      }
    );
  }

  return createError(
    ErrorCode.INTERNAL_ERROR,
    String(error),
    context
  );
}
