/**
 * Inbound request handling
 */

import { ulid } from 'ulid';
import {
  parseConvertRequest,
  toExtractedDocument,
  type ConvertFormJob,
  type ConvertRequest,
  type ExtractedDocument,
} from '@formflow/shared';

export type ParsedRequest =
  | { ok: true; request: ConvertRequest; document: ExtractedDocument }
  | { ok: false; errors: string[] };

/**
 * Validate a request body and build the document it describes. A missing
 * document_id is filled with a fresh ULID.
 */
export function parseRequestBody(body: unknown): ParsedRequest {
  const parsed = parseConvertRequest(body);
  if (!parsed.valid) {
    return { ok: false, errors: parsed.errors };
  }
  const request: ConvertRequest = {
    ...parsed.data,
    document_id: parsed.data.document_id ?? ulid(),
  };
  return { ok: true, request, document: toExtractedDocument(request) };
}

export function toConvertFormJob(request: ConvertRequest, correlationId: string): ConvertFormJob {
  return {
    event_type: 'form.submitted',
    correlation_id: correlationId,
    document_id: request.document_id ?? ulid(),
    source_format: request.source_format ?? 'unknown',
    lines: request.lines,
    ...(request.consent_shaped !== undefined ? { consent_shaped: request.consent_shaped } : {}),
    submitted_at: new Date().toISOString(),
  };
}

/** Queue job IDs may not contain ':' */
export function jobIdFor(documentId: string): string {
  return `convert_${documentId.replace(/:/g, '_')}`;
}
