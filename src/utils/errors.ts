import type { SdkErrorShape } from '../types/index.js';

export class PrivXError extends Error implements SdkErrorShape {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PrivXError';

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PrivXError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

export function createSdkError(
  code: string,
  message: string,
  statusCode: number = 500,
  details?: Record<string, unknown>,
  cause?: unknown
): PrivXError {
  return new PrivXError(code, message, statusCode, details, cause === undefined ? undefined : { cause });
}

export function isPrivXError(error: unknown, code?: string): error is PrivXError {
  return error instanceof PrivXError && (code === undefined || error.code === code);
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : 'unknown error';
}

// Predefined SDK error types
export const SdkErrors = {
  CONFIG_IO_ERROR: (path: string, cause: unknown) =>
    createSdkError(
      'CONFIG_IO_ERROR',
      `Cannot read configuration file ${path}: ${describeCause(cause)}`,
      500,
      { path },
      cause
    ),

  CONFIGURATION_ERROR: (message: string) =>
    createSdkError('CONFIGURATION_ERROR', `Configuration error: ${message}`, 500),

  AUTHENTICATION_FAILED: (reason: string, statusCode: number = 401) =>
    createSdkError('AUTHENTICATION_FAILED', `Authentication failed: ${reason}`, statusCode),

  UNAUTHORIZED: (method: string, path: string, message: string) =>
    createSdkError('UNAUTHORIZED', `${method} ${path}: ${message}`, 401, { method, path }),

  FORBIDDEN: (method: string, path: string, message: string) =>
    createSdkError('FORBIDDEN', `${method} ${path}: ${message}`, 403, { method, path }),

  NOT_FOUND: (method: string, path: string, message: string) =>
    createSdkError('NOT_FOUND', `${method} ${path}: ${message}`, 404, { method, path }),

  HTTP_ERROR: (method: string, path: string, status: number, message: string) =>
    createSdkError('HTTP_ERROR', `${method} ${path}: ${status} ${message}`, status, {
      method,
      path,
    }),

  TRANSPORT_ERROR: (method: string, path: string, cause: unknown) =>
    createSdkError(
      'TRANSPORT_ERROR',
      `${method} ${path}: network error: ${describeCause(cause)}`,
      503,
      { method, path },
      cause
    ),

  INVALID_RESPONSE: (method: string, path: string, reason: string, cause?: unknown) =>
    createSdkError(
      'INVALID_RESPONSE',
      `${method} ${path}: invalid response body: ${reason}`,
      502,
      { method, path },
      cause
    ),

  TIMEOUT: (method: string, path: string, timeout: number) =>
    createSdkError('TIMEOUT', `${method} ${path}: request timed out after ${timeout}ms`, 504, {
      method,
      path,
      timeout,
    }),
} as const;
