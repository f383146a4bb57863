/**
 * Stage 6: KeyUniquenessEnforcer & Normalizer
 *
 * Gives every candidate a unique slug key, brings each control to the
 * canonical shape for its type and renders narrative blocks to text records.
 */

import usStates from '../data/us-states.json';
import { logger } from '../logger';
import {
  DATE_INPUT_TYPES,
  INPUT_TYPES,
  type ChoiceOption,
  type DateInputType,
  type FieldRecord,
  type InputType,
} from '../types';
import { renderNarrativeHtml } from './narrative-html';
import type { CandidateControl, CandidateField, ExtractedItem } from './pipeline-context';
import { slugify, uniqueKey } from './text-utils';

export const TEXT_KEY = 'text';

export const STATE_OPTIONS: readonly ChoiceOption[] = usStates.map((code) => ({ value: code, label: code }));

/** Null stays null (free text); anything unrecognized becomes `name` */
export function normalizeInputType(value: string | null | undefined): InputType | null {
  if (value === null) {
    return null;
  }
  return INPUT_TYPES.find((type) => type === value) ?? 'name';
}

export function normalizeDateInputType(value: string | null | undefined): DateInputType {
  return DATE_INPUT_TYPES.find((type) => type === value) ?? 'past';
}

/** First option with a given value wins; source order is kept */
export function dedupeOptions(options: readonly ChoiceOption[]): ChoiceOption[] {
  const seen = new Set<string>();
  const unique: ChoiceOption[] = [];
  for (const option of options) {
    if (!seen.has(option.value)) {
      seen.add(option.value);
      unique.push({ value: option.value, label: option.label });
    }
  }
  return unique;
}

export function normalizeField(field: CandidateField, key: string): FieldRecord {
  const base = { key, title: field.title, section: field.section, optional: field.optional };
  const control: CandidateControl = field.control;
  const hint = control.hint ?? null;

  switch (field.type) {
    case 'input':
      return { ...base, type: 'input', control: { input_type: normalizeInputType(control.input_type), hint } };
    case 'radio':
      return { ...base, type: 'radio', control: { options: dedupeOptions(control.options ?? []), hint } };
    case 'checkbox':
      return { ...base, type: 'checkbox', control: { options: dedupeOptions(control.options ?? []), hint } };
    case 'date':
      return { ...base, type: 'date', control: { input_type: normalizeDateInputType(control.input_type), hint } };
    case 'signature':
      return { ...base, type: 'signature', control: { hint } };
    case 'states':
      return { ...base, type: 'states', control: { options: [...STATE_OPTIONS], hint } };
    case 'text':
      return { ...base, type: 'text', control: { html_text: '', hint } };
  }
}

export function normalizeItems(items: readonly ExtractedItem[]): FieldRecord[] {
  const taken = new Set<string>();
  const records: FieldRecord[] = [];
  let emptyNarrative = 0;

  for (const item of items) {
    if (item.kind === 'narrative') {
      const html = renderNarrativeHtml(item.block.lines);
      if (!html) {
        emptyNarrative += 1;
        continue;
      }
      const key = uniqueKey(TEXT_KEY, taken);
      taken.add(key);
      records.push({
        key,
        title: '',
        section: item.block.section,
        optional: false,
        type: 'text',
        control: { html_text: html, hint: null },
      });
      continue;
    }

    const key = uniqueKey(slugify(item.field.key ?? item.field.title), taken);
    taken.add(key);
    records.push(normalizeField(item.field, key));
  }

  logger.debug('Fields normalized', { records: records.length, emptyNarrative });
  return records;
}
