/**
 * Conversion Pipeline Tests
 *
 * Runs whole documents through convertDocument and checks the finalized
 * SchemaDocument.
 */

import {
  convertDocument,
  tryConvertDocument,
  validateFormSpec,
  MalformedInputError,
  SchemaViolationError,
  type FieldRecord,
} from '@formflow/shared';
import { documentOf, keysOf } from './helpers';

const WARRANTY_FORM = [
  '**Olympia Hills Family Dental Warranty Document**',
  'Olympia Hills Family Dental | (555) 201-3344 | www.olympiahillsdental.com',
  'This warranty covers crowns and bridges placed in our office.',
  'Coverage lasts five years from the date of placement.',
  'Tooth Number: ________',
  'Patient Signature: ____________',
  'Date: ____________',
  "Witness's Signature Date: ____________",
  "Parent/Guardian's Name: ____________",
];

const EXTRACTION_CONSENT = [
  '# Extraction Consent',
  'I understand the risks of tooth removal.',
  '## Risks',
  '- Swelling',
  '- Dry socket',
  'Patient Name: ____________',
  'Signature: ____________ Date: ____________',
  'Printed name of person signing on behalf of patient: ____________',
];

const INTAKE_FORM = [
  'NEW PATIENT REGISTRATION FORM',
  'First Name: ________',
  'Last Name: ________',
  'Email: ________',
  'Home Phone: ________',
  'Date of Birth: ________',
];

const SEDATION_CONSENT = [
  '# Sedation Consent',
  'I understand the risks of sedation.',
  'Signature of Patient or Parent/Guardian: ________',
];

const TREATMENT_CONSENT = [
  '# Treatment Consent',
  'I consent to treatment.',
  'Is the parent or guardian name on file?',
  '☐ Yes',
  '☐ No',
  'Signature: ________',
];

const ROLE_LINE_CONSENT = [
  '# Extraction Consent',
  'I understand the risks.',
  'Signature: ________',
  'Patient Name: ________   Parent/Guardian Name: ________',
];

function htmlOf(record: FieldRecord): string | null {
  return record.type === 'text' ? record.control.html_text : null;
}

describe('Conversion Pipeline', () => {
  describe('warranty form', () => {
    const result = convertDocument(documentOf('warranty-1', WARRANTY_FORM));

    it('should take the bold first line as the title', () => {
      expect(result.title).toBe('Olympia Hills Family Dental Warranty Document');
      expect(result.form_kind).toBe('structured_consent');
      expect(result.consent_shaped).toBe(true);
    });

    it('should emit the expected fields in reference order', () => {
      expect(keysOf(result.fields)).toEqual(['text', 'text_2', 'parent_guardian_name', 'signature', 'date_signed']);
    });

    it('should strip letterhead and keep the narrative with placeholders', () => {
      expect(htmlOf(result.fields[0])).toBe(
        'This warranty covers crowns and bridges placed in our office.<br>' +
          'Coverage lasts five years from the date of placement.<br>' +
          'Tooth Number: {{tooth_or_site}}'
      );
      expect(result.fields[0].section).toBe('Olympia Hills Family Dental Warranty Document');
      expect(htmlOf(result.fields[1])).toBe('Date: {{today_date}}');
    });

    it('should drop the witness line and promote the guardian name', () => {
      const serialized = JSON.stringify(result.fields);
      expect(serialized).not.toContain('Witness');
      expect(result.fields[2]).toEqual({
        key: 'parent_guardian_name',
        title: 'Parent/Guardian Name',
        section: 'Signature',
        optional: true,
        type: 'input',
        control: { input_type: 'name', hint: null },
      });
    });

    it('should synthesize date_signed as a past date', () => {
      expect(result.fields[4]).toEqual({
        key: 'date_signed',
        title: 'Date Signed',
        section: 'Signature',
        optional: false,
        type: 'date',
        control: { input_type: 'past', hint: null },
      });
    });

    it('should be accepted on the first check', () => {
      expect(result.validation.transitions).toEqual(['checked', 'accepted']);
      expect(result.warnings).toEqual([]);
    });
  });

  describe('sectioned consent', () => {
    const result = convertDocument(documentOf('consent-1', EXTRACTION_CONSENT));

    it('should order narrative ahead of the signature block', () => {
      expect(keysOf(result.fields)).toEqual([
        'text',
        'text_2',
        'signature',
        'date_signed',
        'printed_name_if_signed_on_behalf',
      ]);
    });

    it('should render one text record per section', () => {
      expect(result.fields[0].section).toBe('Extraction Consent');
      expect(htmlOf(result.fields[0])).toBe('I understand the risks of tooth removal.');
      expect(result.fields[1].section).toBe('Risks');
      expect(htmlOf(result.fields[1])).toBe(
        '<ul><li>Swelling</li><li>Dry socket</li></ul>Patient Name: {{patient_name}}'
      );
    });

    it('should mark the on-behalf name optional', () => {
      expect(result.fields[4]).toMatchObject({ optional: true, type: 'input', section: 'Signature' });
    });
  });

  describe('intake form', () => {
    const result = convertDocument(documentOf('intake-1', INTAKE_FORM));

    it('should classify the form without a consent shape', () => {
      expect(result.title).toBe('NEW PATIENT REGISTRATION FORM');
      expect(result.form_kind).toBe('simple_form');
      expect(result.consent_shaped).toBe(false);
    });

    it('should extract every labeled blank as a field', () => {
      expect(keysOf(result.fields)).toEqual(['first_name', 'last_name', 'date_of_birth', 'home_phone', 'email']);
      expect(result.fields.some((record) => record.type === 'text')).toBe(false);
      expect(result.validation.transitions).toEqual(['checked', 'accepted']);
    });
  });

  describe('combined guardian signature', () => {
    const result = convertDocument(documentOf('sedation-1', SEDATION_CONSENT));

    it('should drop the shared patient and guardian signature line', () => {
      expect(keysOf(result.fields)).toEqual(['text', 'signature', 'date_signed']);
      expect(result.fields.some((record) => record.type === 'input')).toBe(false);
    });
  });

  describe('questions about a guardian', () => {
    const result = convertDocument(documentOf('treatment-1', TREATMENT_CONSENT));

    it('should keep the choice group and not promote a guardian name', () => {
      expect(keysOf(result.fields)).toEqual([
        'text',
        'is_the_parent_or_guardian_name_on_file',
        'signature',
        'date_signed',
      ]);
      expect(result.fields[1]).toMatchObject({
        type: 'radio',
        control: {
          options: [
            { value: 'yes', label: 'Yes' },
            { value: 'no', label: 'No' },
          ],
        },
      });
    });
  });

  describe('role line with patient name', () => {
    const result = convertDocument(documentOf('role-line-1', ROLE_LINE_CONSENT));

    it('should keep the patient name beside the promoted guardian name', () => {
      expect(keysOf(result.fields)).toEqual([
        'text',
        'patient_name',
        'parent_guardian_name',
        'signature',
        'date_signed',
      ]);
    });
  });

  describe('invariants', () => {
    const documents = [WARRANTY_FORM, EXTRACTION_CONSENT];

    it('should give every document unique keys and one signature', () => {
      for (const lines of documents) {
        const { fields } = convertDocument(documentOf('invariants', lines));
        const keys = keysOf(fields);

        expect(new Set(keys).size).toBe(keys.length);
        expect(keys.filter((key) => key === 'signature')).toHaveLength(1);
        expect(keys.filter((key) => key === 'date_signed')).toHaveLength(1);
        expect(validateFormSpec(fields)).toEqual({ valid: true });
      }
    });

    it('should produce the same fields for the same input', () => {
      const first = convertDocument(documentOf('same', WARRANTY_FORM));
      const second = convertDocument(documentOf('same', WARRANTY_FORM));

      expect(second.fields).toEqual(first.fields);
    });
  });

  describe('non-consent documents', () => {
    const notice = ['Please bring your insurance card to every visit.'];

    it('should not add signature fields', () => {
      const result = convertDocument(documentOf('notice-1', notice));

      expect(result.title).toBe('Form');
      expect(result.form_kind).toBe('simple_form');
      expect(result.consent_shaped).toBe(false);
      expect(result.fields).toEqual([
        {
          key: 'text',
          title: '',
          section: 'Form',
          optional: false,
          type: 'text',
          control: { html_text: 'Please bring your insurance card to every visit.', hint: null },
        },
      ]);
    });

    it('should add them when the caller forces a consent shape', () => {
      const result = convertDocument(documentOf('notice-2', notice), { consentShaped: true });

      expect(result.consent_shaped).toBe(true);
      expect(keysOf(result.fields)).toEqual(['text', 'signature', 'date_signed']);
    });
  });

  describe('failures', () => {
    it('should reject a document without lines', () => {
      expect(() => convertDocument({ document_id: 'empty', source_format: 'text', lines: [] })).toThrow(
        MalformedInputError
      );
    });

    it('should reject a document with only whitespace', () => {
      expect(() => convertDocument(documentOf('blank', ['  ', '\t']))).toThrow('contains no text');
    });

    it('should raise SchemaViolationError for a choice group without options', () => {
      expect(() => convertDocument(documentOf('bad-radio', ['Do you smoke? ☐ ☐']))).toThrow(SchemaViolationError);
    });

    it('should report failures as values from tryConvertDocument', () => {
      const attempt = tryConvertDocument(documentOf('bad-radio', ['Do you smoke? ☐ ☐']));

      expect(attempt.ok).toBe(false);
      if (!attempt.ok && attempt.error instanceof SchemaViolationError) {
        expect(attempt.error.documentId).toBe('bad-radio');
        expect(attempt.error.violations.map((violation) => violation.code)).toEqual(['empty_options']);
      }
    });
  });
});
