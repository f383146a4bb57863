/**
 * Mapping pipeline failures to HTTP responses
 */

import { MalformedInputError, SchemaViolationError, type ErrorEnvelope } from '@formflow/shared';

export interface ErrorResponse {
  status: number;
  body: ErrorEnvelope;
}

export function invalidRequest(errors: string[], correlationId: string): ErrorResponse {
  return {
    status: 400,
    body: {
      error: {
        code: 'invalid_request',
        message: 'Request body does not match the ConvertRequest contract',
        correlation_id: correlationId,
        details: errors,
      },
    },
  };
}

export function toErrorResponse(error: unknown, correlationId: string): ErrorResponse {
  if (error instanceof MalformedInputError) {
    return {
      status: 400,
      body: { error: { code: error.code, message: error.message, correlation_id: correlationId } },
    };
  }

  if (error instanceof SchemaViolationError) {
    return {
      status: 422,
      body: {
        error: {
          code: error.code,
          message: error.message,
          correlation_id: correlationId,
          details: error.violations,
        },
      },
    };
  }

  return {
    status: 500,
    body: {
      error: {
        code: 'internal_error',
        message: error instanceof Error ? error.message : 'Unknown error',
        correlation_id: correlationId,
      },
    },
  };
}

export function tooManyRequests(correlationId: string): ErrorResponse {
  return {
    status: 429,
    body: {
      error: {
        code: 'too_many_requests',
        message: 'System is under heavy load. Please retry later.',
        correlation_id: correlationId,
      },
    },
  };
}
