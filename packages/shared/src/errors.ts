/**
 * Pipeline Errors
 *
 * Only two conditions stop a document: input that carries no text at all, and
 * a SchemaDocument that still violates the output contract after the repair
 * pass. Everything else is recovered inside the stage that meets it.
 */

import type { Violation } from './types';

export class MalformedInputError extends Error {
  readonly code = 'malformed_input';

  constructor(message: string) {
    super(message);
    this.name = 'MalformedInputError';

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, MalformedInputError.prototype);
  }
}

export class SchemaViolationError extends Error {
  readonly code = 'schema_violation';

  readonly documentId: string;

  /**
   * Violations left after the single repair pass
   */
  readonly violations: Violation[];

  constructor(params: { documentId: string; violations: Violation[] }) {
    const summary = params.violations.map((v) => v.code).join(', ');
    super(`Document ${params.documentId} rejected: ${summary}`);
    this.name = 'SchemaViolationError';
    this.documentId = params.documentId;
    this.violations = params.violations;

    Object.setPrototypeOf(this, SchemaViolationError.prototype);
  }
}

/**
 * Narrow an unknown thrown value to one of the pipeline's own errors
 */
export function isPipelineError(error: unknown): error is MalformedInputError | SchemaViolationError {
  return error instanceof MalformedInputError || error instanceof SchemaViolationError;
}
