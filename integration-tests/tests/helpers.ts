/**
 * Test Helpers
 *
 * Builders for documents, lines and field records.
 */

import {
  PipelineContext,
  resolveSettings,
  toExtractedDocument,
  type CandidateField,
  type DocumentLine,
  type ExtractedDocument,
  type ExtractedItem,
  type FieldRecord,
  type PipelineOptions,
  type PipelineSettings,
} from '@formflow/shared';

export function lines(...texts: string[]): DocumentLine[] {
  return texts.map((text, index) => ({ index, text }));
}

export function documentOf(documentId: string, texts: string[]): ExtractedDocument {
  return toExtractedDocument({ document_id: documentId, source_format: 'text', lines: texts });
}

export function settings(overrides: PipelineOptions = {}): PipelineSettings {
  return resolveSettings(overrides);
}

export function contextFor(documentId = 'doc-test', options: PipelineOptions = {}): PipelineContext {
  return new PipelineContext(documentId, options);
}

export function fieldsOf(items: readonly ExtractedItem[]): CandidateField[] {
  return items.flatMap((item) => (item.kind === 'field' ? [item.field] : []));
}

export function narrativeTextsOf(items: readonly ExtractedItem[]): string[] {
  return items.flatMap((item) => (item.kind === 'narrative' ? item.block.lines.map((line) => line.text) : []));
}

export function candidate(overrides: Partial<CandidateField> & Pick<CandidateField, 'type'>): CandidateField {
  return {
    key: null,
    title: 'Field',
    section: 'Signature',
    optional: false,
    control: {},
    lineIndex: 0,
    origin: 'segment',
    rule: 'test',
    ...overrides,
  };
}

export function textRecord(key: string, html: string, section = 'Consent'): FieldRecord {
  return { key, title: '', section, optional: false, type: 'text', control: { html_text: html, hint: null } };
}

export function inputRecord(key: string, section = 'Consent'): FieldRecord {
  return { key, title: key, section, optional: false, type: 'input', control: { input_type: 'name', hint: null } };
}

export function signatureRecord(key = 'signature'): FieldRecord {
  return { key, title: 'Signature', section: 'Signature', optional: false, type: 'signature', control: { hint: null } };
}

export function dateSignedRecord(key = 'date_signed'): FieldRecord {
  return {
    key,
    title: 'Date Signed',
    section: 'Signature',
    optional: false,
    type: 'date',
    control: { input_type: 'past', hint: null },
  };
}

export function keysOf(records: readonly FieldRecord[]): string[] {
  return records.map((record) => record.key);
}
