/**
 * Normalizer and narrative rendering Tests
 */

import {
  dedupeOptions,
  normalizeInputType,
  normalizeItems,
  renderNarrativeHtml,
  slugify,
  uniqueKey,
  type ExtractedItem,
  type NarrativeLine,
} from '@formflow/shared';
import { candidate } from './helpers';

function narrative(...texts: Array<string | [string, boolean]>): NarrativeLine[] {
  return texts.map((entry, index) =>
    typeof entry === 'string' ? { index, text: entry, bold: false } : { index, text: entry[0], bold: entry[1] }
  );
}

describe('Normalizer', () => {
  describe('slugify', () => {
    it.each([
      ["Patient's Name", 'patient_name'],
      ['Relationship to Patient', 'relationship_to_patient'],
      ['Café Préférence', 'cafe_preference'],
      ['  Date (MM/DD/YYYY):  ', 'date_mm_dd_yyyy'],
      ['???', 'field'],
    ])('%p -> %p', (title, expected) => {
      expect(slugify(title)).toBe(expected);
    });
  });

  describe('uniqueKey', () => {
    it('should suffix collisions and skip taken suffixes', () => {
      const taken = new Set(['text', 'text_2']);
      expect(uniqueKey('text', taken)).toBe('text_3');
      expect(uniqueKey('notes', taken)).toBe('notes');
    });
  });

  describe('control helpers', () => {
    it('should map unknown input types to name and keep null', () => {
      expect(normalizeInputType('nickname')).toBe('name');
      expect(normalizeInputType(undefined)).toBe('name');
      expect(normalizeInputType(null)).toBeNull();
      expect(normalizeInputType('zip')).toBe('zip');
    });

    it('should keep the first option per value', () => {
      expect(
        dedupeOptions([
          { value: 'latex', label: 'Latex' },
          { value: 'latex', label: 'Latex gloves' },
          { value: 'none', label: 'None' },
        ])
      ).toEqual([
        { value: 'latex', label: 'Latex' },
        { value: 'none', label: 'None' },
      ]);
    });
  });

  describe('renderNarrativeHtml', () => {
    it('should render headers, bullets and escaped text', () => {
      const html = renderNarrativeHtml(narrative('# Risks', '- Swelling', '- Bleeding & pain', 'Call us if <concerned>.'));

      expect(html).toBe(
        '<strong>Risks</strong><ul><li>Swelling</li><li>Bleeding &amp; pain</li></ul>Call us if &lt;concerned&gt;.'
      );
    });

    it('should join plain lines with <br> and honor bold', () => {
      const html = renderNarrativeHtml(
        narrative('I understand the **risks**.', ['Read carefully', true], '“Quoted” text’s here')
      );

      expect(html).toBe(
        'I understand the <strong>risks</strong>.<br><strong>Read carefully</strong><br>&quot;Quoted&quot; text\'s here'
      );
    });

    it('should drop private-use glyphs and orphan markers', () => {
      expect(renderNarrativeHtml(narrative('\uE001Hello', '**Note'))).toBe('Hello<br>Note');
    });

    it('should render nothing for whitespace', () => {
      expect(renderNarrativeHtml(narrative('   ', ''))).toBe('');
    });
  });

  describe('normalizeItems', () => {
    const items: ExtractedItem[] = [
      { kind: 'narrative', block: { section: 'Consent', lines: narrative('Hello') } },
      { kind: 'field', field: candidate({ type: 'input', title: "Patient's Name", control: { input_type: 'nickname' } }) },
      { kind: 'field', field: candidate({ type: 'input', title: 'Patient Name', control: { input_type: 'name' } }) },
      {
        kind: 'field',
        field: candidate({
          type: 'checkbox',
          title: 'Allergies',
          control: {
            options: [
              { value: 'latex', label: 'Latex' },
              { value: 'latex', label: 'Latex (2)' },
            ],
          },
        }),
      },
      { kind: 'field', field: candidate({ type: 'date', title: 'Date' }) },
      { kind: 'field', field: candidate({ type: 'states', key: 'state', title: 'State', control: { hint: null } }) },
      { kind: 'field', field: candidate({ type: 'input', key: 'tooth_number', title: 'Tooth Number', control: { input_type: null } }) },
      { kind: 'narrative', block: { section: 'Signature', lines: narrative('   ') } },
      { kind: 'narrative', block: { section: 'Signature', lines: narrative('Keep a copy.') } },
    ];

    const records = normalizeItems(items);

    it('should give every record a unique key', () => {
      expect(records.map((record) => record.key)).toEqual([
        'text',
        'patient_name',
        'patient_name_2',
        'allergies',
        'date',
        'state',
        'tooth_number',
        'text_2',
      ]);
    });

    it('should emit text records with an empty title', () => {
      expect(records[0]).toEqual({
        key: 'text',
        title: '',
        section: 'Consent',
        optional: false,
        type: 'text',
        control: { html_text: 'Hello', hint: null },
      });
    });

    it('should bring each control to its canonical shape', () => {
      expect(records[1].control).toEqual({ input_type: 'name', hint: null });
      expect(records[3].control).toEqual({ options: [{ value: 'latex', label: 'Latex' }], hint: null });
      expect(records[4].control).toEqual({ input_type: 'past', hint: null });
      expect(records[6].control).toEqual({ input_type: null, hint: null });
    });

    it('should fill states with the state-code enumeration', () => {
      const states = records[5];
      expect(states.type).toBe('states');
      if (states.type === 'states') {
        expect(states.control.options).toHaveLength(51);
        expect(states.control.options[0]).toEqual({ value: 'AL', label: 'AL' });
      }
    });
  });
});
