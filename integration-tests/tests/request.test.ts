/**
 * Converter API request and response mapping Tests
 */

import { MalformedInputError, SchemaViolationError, parseConvertFormJob, type Violation } from '@formflow/shared';
import { jobIdFor, parseRequestBody, toConvertFormJob } from '../../services/converter-api/src/lib/request';
import { invalidRequest, tooManyRequests, toErrorResponse } from '../../services/converter-api/src/lib/responses';

describe('Converter API', () => {
  describe('parseRequestBody', () => {
    it('should build a document from plain and rich lines', () => {
      const parsed = parseRequestBody({
        document_id: 'doc-1',
        source_format: 'pdf',
        lines: ['Consent', { text: 'Read carefully', bold: true }],
      });

      expect(parsed.ok).toBe(true);
      if (parsed.ok) {
        expect(parsed.document).toEqual({
          document_id: 'doc-1',
          source_format: 'pdf',
          lines: [
            { index: 0, text: 'Consent', sourceFormat: 'pdf' },
            { index: 1, text: 'Read carefully', bold: true, sourceFormat: 'pdf' },
          ],
        });
      }
    });

    it('should fill a missing document_id', () => {
      const parsed = parseRequestBody({ lines: ['x'] });

      expect(parsed.ok).toBe(true);
      if (parsed.ok) {
        expect(parsed.document.document_id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
        expect(parsed.document.source_format).toBe('unknown');
      }
    });

    it.each([
      [{ lines: 'not a list' }],
      [{ document_id: 'doc-1' }],
      [{ lines: [], unexpected: true }],
      [{ lines: [{ text: 'x', colour: 'red' }] }],
    ])('should refuse %p', (body) => {
      const parsed = parseRequestBody(body);
      expect(parsed.ok).toBe(false);
    });
  });

  describe('toConvertFormJob', () => {
    it('should build a payload the job contract accepts', () => {
      const job = toConvertFormJob({ document_id: 'doc-1', lines: ['Consent'] }, 'cid-1');

      expect(job).toMatchObject({
        event_type: 'form.submitted',
        correlation_id: 'cid-1',
        document_id: 'doc-1',
        source_format: 'unknown',
        lines: ['Consent'],
      });
      expect('consent_shaped' in job).toBe(false);
      expect(parseConvertFormJob(job).valid).toBe(true);
    });

    it('should carry the consent override', () => {
      const job = toConvertFormJob({ document_id: 'doc-1', lines: [], consent_shaped: true }, 'cid-1');
      expect(job.consent_shaped).toBe(true);
    });

    it('should refuse a payload without a timestamp', () => {
      const payload = { event_type: 'form.submitted', correlation_id: 'c', document_id: 'd', source_format: 'text', lines: [] };
      expect(parseConvertFormJob(payload).valid).toBe(false);
    });
  });

  describe('jobIdFor', () => {
    it('should replace colons', () => {
      expect(jobIdFor('tenant:42')).toBe('convert_tenant_42');
    });
  });

  describe('responses', () => {
    it('should answer malformed input with 400', () => {
      expect(toErrorResponse(new MalformedInputError('Document d contains no text'), 'cid-1')).toEqual({
        status: 400,
        body: { error: { code: 'malformed_input', message: 'Document d contains no text', correlation_id: 'cid-1' } },
      });
    });

    it('should answer schema violations with 422 and their details', () => {
      const violations: Violation[] = [
        { code: 'empty_options', severity: 'fatal', message: 'Choice record q has no options', key: 'q' },
      ];
      const response = toErrorResponse(new SchemaViolationError({ documentId: 'd', violations }), 'cid-1');

      expect(response.status).toBe(422);
      expect(response.body.error).toEqual({
        code: 'schema_violation',
        message: 'Document d rejected: empty_options',
        correlation_id: 'cid-1',
        details: violations,
      });
    });

    it('should answer unexpected errors with 500', () => {
      expect(toErrorResponse(new Error('redis down'), 'cid-1')).toEqual({
        status: 500,
        body: { error: { code: 'internal_error', message: 'redis down', correlation_id: 'cid-1' } },
      });
    });

    it('should build the invalid-request and backpressure envelopes', () => {
      expect(invalidRequest(['/lines: must be array'], 'cid-1').body.error.details).toEqual(['/lines: must be array']);
      expect(tooManyRequests('cid-1').status).toBe(429);
    });

    it('should label backpressure rejections as too_many_requests', () => {
      expect(tooManyRequests('cid-2')).toEqual({
        status: 429,
        body: {
          error: {
            code: 'too_many_requests',
            message: 'System is under heavy load. Please retry later.',
            correlation_id: 'cid-2',
          },
        },
      });
    });
  });
});
