/**
 * SignatureRoleFilter Tests
 */

import {
  classifySignerRole,
  filterSignatureRoles,
  isBlankArtifact,
  type ExtractedItem,
} from '@formflow/shared';
import { candidate, contextFor, settings } from './helpers';

function signatureBlock(): ExtractedItem[] {
  return [
    {
      kind: 'narrative',
      block: {
        section: 'Signature',
        lines: [
          { index: 10, text: 'Witness Signature: ______', bold: false },
          { index: 11, text: "Parent/Guardian's Name: ______", bold: false },
          { index: 12, text: '______________________', bold: false },
          { index: 13, text: 'Please keep a copy.', bold: false },
        ],
      },
    },
    { kind: 'field', field: candidate({ type: 'signature', key: 'signature', title: 'Signature', lineIndex: 5 }) },
    { kind: 'field', field: candidate({ type: 'signature', title: 'Patient Signature', lineIndex: 6 }) },
    { kind: 'field', field: candidate({ type: 'signature', title: "Doctor's Signature", lineIndex: 7 }) },
  ];
}

function describeItems(items: readonly ExtractedItem[]): string[] {
  return items.map((item) =>
    item.kind === 'narrative' ? `narrative:${item.block.lines.length}` : `${item.field.key ?? item.field.title}`
  );
}

describe('SignatureRoleFilter', () => {
  describe('classifySignerRole', () => {
    it.each([
      ["Witness's Signature Date", 'witness'],
      ["Dentist's Signature", 'provider'],
      ['Patient/Parent/Guardian Signature', 'guardian_signature'],
      ['Legally Authorized Representative', 'guardian_signature'],
      ['Parent/Guardian’s Name', 'guardian_name'],
      ['Signature of Patient or Parent/Guardian: ________', 'guardian_signature'],
      ['Signature (Patient or Representative)', 'guardian_signature'],
      ['Patient Signature', null],
      ['If the patient is a minor, a signature from the parent or legal guardian is required below.', null],
    ])('%p -> %p', (text, role) => {
      expect(classifySignerRole(text)).toBe(role);
    });
  });

  describe('isBlankArtifact', () => {
    it('should respect the minimum length', () => {
      expect(isBlankArtifact('_________', settings())).toBe(false);
      expect(isBlankArtifact('__________', settings())).toBe(true);
    });

    it('should drop lines at the blank-fill ratio and keep lines below it', () => {
      expect(isBlankArtifact('abc_______', settings())).toBe(true);
      expect(isBlankArtifact('abcd______', settings())).toBe(false);
    });

    it('should ignore labeled lines', () => {
      expect(isBlankArtifact('Name of person __', settings())).toBe(false);
    });
  });

  it('should drop disallowed roles, promote the guardian name and keep one signature', () => {
    const result = filterSignatureRoles(signatureBlock(), contextFor(), true);

    expect(describeItems(result)).toEqual([
      'narrative:1',
      'parent_guardian_name',
      'signature',
      'date_signed',
    ]);
    expect(result[0]).toEqual({
      kind: 'narrative',
      block: { section: 'Signature', lines: [{ index: 13, text: 'Please keep a copy.', bold: false }] },
    });
    expect(result[1]).toEqual({
      kind: 'field',
      field: {
        key: 'parent_guardian_name',
        title: 'Parent/Guardian Name',
        section: 'Signature',
        optional: true,
        type: 'input',
        control: { input_type: 'name', hint: null },
        lineIndex: 11,
        origin: 'promoted',
        rule: 'guardian_name',
      },
    });
  });

  it('should synthesize date_signed as a past date', () => {
    const result = filterSignatureRoles(signatureBlock(), contextFor(), true);
    const last = result[result.length - 1];

    expect(last.kind === 'field' && last.field).toMatchObject({
      key: 'date_signed',
      type: 'date',
      control: { input_type: 'past', hint: null },
      origin: 'synthesized',
    });
  });

  it('should rekey the first signature-typed field', () => {
    const items: ExtractedItem[] = [
      { kind: 'field', field: candidate({ type: 'signature', title: 'Patient Signature' }) },
      { kind: 'field', field: candidate({ type: 'date', key: 'date_signed', title: 'Date Signed' }) },
    ];

    expect(describeItems(filterSignatureRoles(items, contextFor(), true))).toEqual(['signature', 'date_signed']);
  });

  it('should leave mandatory fields alone on other documents', () => {
    const result = filterSignatureRoles(signatureBlock(), contextFor(), false);

    expect(describeItems(result)).toEqual(['narrative:1', 'parent_guardian_name', 'signature', 'Patient Signature']);
  });

  it('should keep choice groups whose question mentions a signer role', () => {
    const question = candidate({
      type: 'radio',
      title: 'Is the parent or guardian name on file?',
      section: 'Consent',
      origin: 'block',
      rule: 'radio_question',
      control: {
        options: [
          { value: 'yes', label: 'Yes' },
          { value: 'no', label: 'No' },
        ],
        hint: null,
      },
    });
    const items: ExtractedItem[] = [{ kind: 'field', field: question }];

    expect(filterSignatureRoles(items, contextFor(), false)).toEqual([{ kind: 'field', field: question }]);
  });

  it('should promote the guardian name only once', () => {
    const items: ExtractedItem[] = [
      {
        kind: 'narrative',
        block: {
          section: 'Signature',
          lines: [
            { index: 1, text: 'Parent Name: ______', bold: false },
            { index: 2, text: 'Guardian Name: ______', bold: false },
          ],
        },
      },
    ];

    expect(describeItems(filterSignatureRoles(items, contextFor(), false))).toEqual([
      'narrative:0',
      'parent_guardian_name',
    ]);
  });
});
