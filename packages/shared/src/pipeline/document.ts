/**
 * Building ExtractedDocuments from request payloads
 */

import { ulid } from 'ulid';
import { MalformedInputError } from '../errors';
import type { ConvertRequest, DocumentLine, ExtractedDocument } from '../types';

export function toExtractedDocument(request: ConvertRequest): ExtractedDocument {
  const sourceFormat = request.source_format ?? 'unknown';
  const lines: DocumentLine[] = request.lines.map((line, index) =>
    typeof line === 'string'
      ? { index, text: line, sourceFormat }
      : { index, text: line.text, bold: line.bold, sourceFormat }
  );
  return {
    document_id: request.document_id ?? ulid(),
    source_format: sourceFormat,
    lines,
  };
}

/**
 * Split plain extracted text into a document, one line per newline
 */
export function fromPlainText(documentId: string, text: string): ExtractedDocument {
  return toExtractedDocument({ document_id: documentId, source_format: 'text', lines: text.split(/\r?\n/) });
}

/**
 * Throws MalformedInputError unless the document carries at least one line of text
 */
export function assertWellFormed(document: ExtractedDocument): void {
  if (!Array.isArray(document.lines)) {
    throw new MalformedInputError(`Document ${document.document_id} has no line stream`);
  }
  if (document.lines.length === 0) {
    throw new MalformedInputError(`Document ${document.document_id} has an empty line stream`);
  }
  const hasText = document.lines.some((line) => typeof line.text === 'string' && line.text.trim().length > 0);
  if (!hasText) {
    throw new MalformedInputError(`Document ${document.document_id} contains no text`);
  }
}
