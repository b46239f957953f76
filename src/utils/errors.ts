import { ZodError } from 'zod';
import type { FastifyRequest } from 'fastify';
import { getRequestId } from './request-id.js';

/**
 * Error codes for structured error responses
 */
export type ErrorCode = 'BAD_INPUT' | 'NOT_FOUND' | 'RATE_LIMITED' | 'UPSTREAM_ERROR' | 'INTERNAL';

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: 'error.v1';
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

/**
 * Raised when the linguistic-analysis engine cannot segment or parse input.
 *
 * Never recovered inside the pipeline: a run either completes or fails here.
 * Retry policy belongs to the caller.
 */
export class AnalysisEngineError extends Error {
  readonly name = 'AnalysisEngineError';
  readonly code = 'ANALYSIS_ENGINE_FAILED';

  constructor(
    message: string,
    public readonly engine: string,
    public readonly operation: 'split_sentences' | 'parse' | 'load',
    options?: { cause?: unknown },
  ) {
    super(message, options);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AnalysisEngineError);
    }
  }
}

/**
 * Build a structured error response
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: 'error.v1',
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1 {
  return buildErrorV1(
    'BAD_INPUT',
    'Validation failed',
    {
      validation_errors: error.flatten(),
    },
    requestId
  );
}

function readNumericField(error: Error, field: 'statusCode' | 'retryAfter'): number | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'number' ? value : undefined;
}

function readStringField(error: Error, field: 'code'): string | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Strip file paths, key/secret assignments and email addresses from a message
 */
export function sanitizeErrorMessage(message: string): string {
  return message
    .replace(/\/[\w/.@-]+/g, '[path]')
    .replace(/[A-Z_]+_?KEY=\S+/gi, '[KEY_REDACTED]')
    .replace(/[A-Z_]+_?SECRET=\S+/gi, '[SECRET_REDACTED]')
    .replace(/[\w.-]+@[\w.-]+\.\w+/g, '[email]');
}

/**
 * Convert any error to ErrorV1 (safe, never leaks stack/PII)
 *
 * @param error The error to convert
 * @param request Optional Fastify request for context
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1 {
  const requestId = request ? getRequestId(request) : undefined;

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  if (error instanceof AnalysisEngineError) {
    return buildErrorV1(
      'UPSTREAM_ERROR',
      'Linguistic analysis failed',
      { engine: error.engine, operation: error.operation },
      requestId
    );
  }

  if (error instanceof Error) {
    const statusCode = readNumericField(error, 'statusCode');
    const code = readStringField(error, 'code');

    if (statusCode === 429 || error.message.toLowerCase().includes('rate limit')) {
      return buildErrorV1(
        'RATE_LIMITED',
        'Too many requests',
        { retry_after_seconds: readNumericField(error, 'retryAfter') ?? 60 },
        requestId
      );
    }

    if (code === 'FST_ERR_CTP_BODY_TOO_LARGE') {
      return buildErrorV1('BAD_INPUT', 'Request body too large', undefined, requestId);
    }

    // Fastify's own 4xx errors (malformed JSON, wrong content type)
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      return buildErrorV1('BAD_INPUT', sanitizeErrorMessage(error.message), undefined, requestId);
    }

    return buildErrorV1(
      'INTERNAL',
      sanitizeErrorMessage(error.message || 'An unexpected error occurred'),
      undefined,
      requestId
    );
  }

  if (typeof error === 'string') {
    return buildErrorV1('INTERNAL', sanitizeErrorMessage(error), undefined, requestId);
  }

  return buildErrorV1('INTERNAL', 'An unexpected error occurred', undefined, requestId);
}

/**
 * Get HTTP status code for error code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case 'BAD_INPUT':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'RATE_LIMITED':
      return 429;
    case 'UPSTREAM_ERROR':
      return 502;
    case 'INTERNAL':
    default:
      return 500;
  }
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
