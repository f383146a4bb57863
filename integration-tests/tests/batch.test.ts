/**
 * Batch Conversion Tests
 *
 * One failing document must never stop the rest of the batch.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SchemaViolationError, MalformedInputError } from '@formflow/shared';
import { convertBatch, describeFailure, type BatchEntry } from '../../services/worker-form-converter/src/lib/batch';
import { outputFileName, writeSchemaDocument } from '../../services/worker-form-converter/src/lib/output';
import { documentOf, textRecord } from './helpers';

const CONSENT = ['# Whitening Consent', 'I understand that results vary.', 'Signature: ______ Date: ______'];

describe('Batch Conversion', () => {
  it('should isolate failures and keep input order', async () => {
    const seen: string[] = [];
    const report = await convertBatch(
      [
        documentOf('first', CONSENT),
        { document_id: 'empty', source_format: 'text', lines: [] },
        documentOf('bad-radio', ['Do you smoke? ☐ ☐']),
        documentOf('last', CONSENT),
      ],
      { concurrency: 2, onResult: (entry) => void seen.push(entry.document_id) }
    );

    expect(report.entries.map((entry) => [entry.document_id, entry.status])).toEqual([
      ['first', 'passed'],
      ['empty', 'failed'],
      ['bad-radio', 'failed'],
      ['last', 'passed'],
    ]);
    expect(report.summary).toMatchObject({ total: 4, passed: 2, failed: 2 });
    expect(seen.sort()).toEqual(['bad-radio', 'empty', 'first', 'last']);
  });

  it('should keep the report when a result callback rejects', async () => {
    const report = await convertBatch([documentOf('first', CONSENT), documentOf('second', CONSENT)], {
      concurrency: 1,
      onResult: async (entry) => {
        if (entry.document_id === 'first') {
          throw new Error('sink unavailable');
        }
      },
    });

    expect(report.entries.map((entry) => [entry.document_id, entry.status])).toEqual([
      ['first', 'passed'],
      ['second', 'passed'],
    ]);
    expect(report.summary).toMatchObject({ total: 2, passed: 2, failed: 0 });
  });

  it('should describe each failure by code', async () => {
    const { entries } = await convertBatch([
      { document_id: 'empty', source_format: 'text', lines: [] },
      documentOf('bad-radio', ['Do you smoke? ☐ ☐']),
    ]);
    const failures = entries.flatMap((entry: BatchEntry) => (entry.status === 'failed' ? [entry.error] : []));

    expect(failures.map((failure) => failure.code)).toEqual(['malformed_input', 'schema_violation']);
    expect(failures[1].violations?.map((violation) => violation.code)).toEqual(['empty_options']);
  });

  it('should return an empty summary for an empty batch', async () => {
    const report = await convertBatch([]);
    expect(report.entries).toEqual([]);
    expect(report.summary).toMatchObject({ total: 0, passed: 0, failed: 0 });
  });

  describe('describeFailure', () => {
    it('should map pipeline and unexpected errors', () => {
      expect(describeFailure(new MalformedInputError('no text'))).toEqual({ code: 'malformed_input', message: 'no text' });
      expect(describeFailure(new SchemaViolationError({ documentId: 'd', violations: [] }))).toEqual({
        code: 'schema_violation',
        message: 'Document d rejected: ',
        violations: [],
      });
      expect(describeFailure(new Error('boom'))).toEqual({ code: 'internal_error', message: 'boom' });
    });
  });

  describe('writeSchemaDocument', () => {
    let outputDir: string;

    beforeEach(() => {
      outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'formflow-'));
    });

    afterEach(() => {
      fs.rmSync(outputDir, { recursive: true, force: true });
    });

    it('should write the field array as JSON', async () => {
      const fields = [textRecord('text', 'Hello')];
      const uri = await writeSchemaDocument(outputDir, 'doc-1', fields);
      const filePath = path.join(outputDir, 'doc-1.json');

      expect(uri).toBe(`file://${filePath}`);
      expect(JSON.parse(fs.readFileSync(filePath, 'utf-8'))).toEqual(fields);
    });

    it('should sanitize document IDs in file names', () => {
      expect(outputFileName('tenant:42/form a')).toBe('tenant_42_form_a.json');
    });
  });
});
