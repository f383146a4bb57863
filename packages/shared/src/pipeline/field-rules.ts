/**
 * Field rule tables
 *
 * Two ordered tables drive the FieldPatternMatcher. Block rules look at a
 * run of lines (choice groups, state lists); segment rules look at one piece
 * of a line. Earlier entries win when several rules match the same text.
 */

import usStates from '../data/us-states.json';
import type { ChoiceOption, FieldType } from '../types';
import type { CandidateControl } from './pipeline-context';
import { BLANK_RUN, FIELD_TAIL, PAREN_HINT, collapseWhitespace, slugify } from './text-utils';

/**
 * `signature` rules run in the signature block, and in every section of
 * field-shaped forms (intake and simple forms)
 */
export type RuleScope = 'any' | 'signature';

type Resolvable<T> = T | ((match: RegExpExecArray) => T);

export interface SegmentRule {
  name: string;
  pattern: RegExp;
  /** Fixed output key; null derives the key from the title */
  key: string | null;
  title: Resolvable<string>;
  type: FieldType;
  control: Resolvable<CandidateControl>;
  scope: RuleScope;
  /** Rule only applies once the named rule matched earlier on the same line */
  after?: string;
  /** Record the key so later matches of the same concept are no-ops */
  markProcessed: boolean;
  optional?: boolean;
  /** Catch-all rules never count as competitors in ambiguity warnings */
  fallback?: boolean;
}

const POSSESSIVE = "(?:['’]s)?";

function segment(source: string): RegExp {
  return new RegExp(source, 'i');
}

function cleanLabel(label: string): string {
  return collapseWhitespace(label).replace(/[\s:.,;-]+$/, '');
}

export function inferInputType(label: string): CandidateControl['input_type'] {
  if (/e-?mail/i.test(label)) return 'email';
  if (/\b(?:phone|mobile|cell|fax|telephone)\b/i.test(label)) return 'phone';
  if (/\b(?:zip|postal)\b/i.test(label)) return 'zip';
  if (/\b(?:ssn|social\s+security)\b/i.test(label)) return 'ssn';
  if (/\binitials?\b/i.test(label)) return 'initials';
  if (/\b(?:age|amount|number|no\.)\s*$/i.test(label)) return 'number';
  return 'name';
}

export const SEGMENT_RULES: readonly SegmentRule[] = [
  {
    name: 'printed_name_on_behalf',
    pattern: segment(
      `^(?:print(?:ed)?\\s+)?name\\b[^:_\\n]{0,40}?\\bon\\s+behalf\\s+of\\s+(?:the\\s+)?patient${PAREN_HINT}${FIELD_TAIL}`
    ),
    key: 'printed_name_if_signed_on_behalf',
    title: 'Printed name if signed on behalf of the patient',
    type: 'input',
    control: { input_type: 'name', hint: null },
    scope: 'signature',
    markProcessed: true,
    optional: true,
  },
  {
    name: 'patient_name_print',
    pattern: segment(
      `^(?:patient${POSSESSIVE}\\s+name\\s*\\(\\s*print(?:ed)?\\s*\\)|print(?:ed)?\\s+patient${POSSESSIVE}\\s+name|patient${POSSESSIVE}\\s+printed\\s+name)${FIELD_TAIL}`
    ),
    key: 'patient_name_print',
    title: 'Patient Name (print)',
    type: 'input',
    control: { input_type: 'name', hint: null },
    scope: 'signature',
    markProcessed: true,
  },
  {
    name: 'patient_name',
    pattern: segment(`^(?:patient${POSSESSIVE}\\s+name|name\\s+of\\s+patient)${PAREN_HINT}${FIELD_TAIL}`),
    key: 'patient_name',
    title: 'Patient Name',
    type: 'input',
    control: { input_type: 'name', hint: null },
    scope: 'signature',
    markProcessed: true,
  },
  {
    name: 'printed_name',
    pattern: segment(`^(?:print(?:ed)?\\s+)?name${PAREN_HINT}${FIELD_TAIL}`),
    key: 'printed_name',
    title: 'Printed Name',
    type: 'input',
    control: { input_type: 'name', hint: null },
    scope: 'signature',
    markProcessed: true,
  },
  {
    name: 'relationship',
    pattern: segment(
      `^relationship(?:\\s+to\\s+(?:the\\s+)?patient)?${PAREN_HINT}[ \\t]*:?[ \\t]*${BLANK_RUN}`
    ),
    key: 'relationship',
    title: 'Relationship to Patient',
    type: 'input',
    control: { input_type: 'name', hint: null },
    scope: 'signature',
    markProcessed: true,
  },
  {
    name: 'date_of_birth',
    pattern: segment(
      `\\b(?:patient${POSSESSIVE}\\s+)?(?:date\\s+of\\s+birth|birth\\s*date|DOB)\\b${PAREN_HINT}${FIELD_TAIL}`
    ),
    key: 'date_of_birth',
    title: 'Date of Birth',
    type: 'date',
    control: { input_type: 'past', hint: null },
    scope: 'any',
    markProcessed: true,
  },
  {
    name: 'date_signed',
    pattern: segment(
      `\\b(?:date\\s+signed|date\\s+of\\s+signature|signature\\s+date)\\b${PAREN_HINT}${FIELD_TAIL}`
    ),
    key: 'date_signed',
    title: 'Date Signed',
    type: 'date',
    control: { input_type: 'past', hint: null },
    scope: 'any',
    markProcessed: true,
  },
  {
    name: 'procedure_date',
    pattern: segment(
      `\\b(?:(?:procedure|appointment|surgery|treatment|scheduled)\\s+date|date\\s+of\\s+(?:procedure|surgery|appointment|treatment))\\b${PAREN_HINT}${FIELD_TAIL}`
    ),
    key: 'procedure_date',
    title: 'Procedure Date',
    type: 'date',
    control: { input_type: 'future', hint: null },
    scope: 'any',
    markProcessed: true,
  },
  {
    name: 'signature',
    pattern: segment(
      `^(?:patient${POSSESSIVE}\\s+)?signatures?(?:\\s+of\\s+(?:the\\s+)?patient)?${PAREN_HINT}(?:${FIELD_TAIL}|[ \\t]*$)`
    ),
    key: 'signature',
    title: 'Signature',
    type: 'signature',
    control: {},
    scope: 'any',
    markProcessed: true,
  },
  {
    name: 'date_beside_signature',
    pattern: segment(`^date${PAREN_HINT}${FIELD_TAIL}`),
    key: 'date_signed',
    title: 'Date Signed',
    type: 'date',
    control: { input_type: 'past', hint: null },
    scope: 'any',
    after: 'signature',
    markProcessed: true,
  },
  {
    name: 'tooth_number',
    pattern: segment(`\\btooth\\s*(?:numbers?|nos?\\.|#)(?:\\(s\\))?${PAREN_HINT}${FIELD_TAIL}`),
    key: 'tooth_number',
    title: 'Tooth Number',
    type: 'input',
    control: { input_type: null, hint: null },
    scope: 'signature',
    markProcessed: true,
  },
  {
    name: 'initials',
    pattern: segment(
      `(?:\\b(?:patient${POSSESSIVE}\\s+)?initials?\\b${PAREN_HINT}${FIELD_TAIL}|${BLANK_RUN}[ \\t]*\\(?initials?\\)?)`
    ),
    key: 'initials',
    title: 'Initials',
    type: 'input',
    control: { input_type: 'initials', hint: null },
    scope: 'any',
    markProcessed: false,
  },
  {
    name: 'email',
    pattern: segment(`^e-?mail(?:\\s+address)?${PAREN_HINT}${FIELD_TAIL}`),
    key: 'email',
    title: 'Email',
    type: 'input',
    control: { input_type: 'email', hint: null },
    scope: 'signature',
    markProcessed: true,
  },
  {
    name: 'phone',
    // Keyed by label so home, cell and work numbers stay separate fields
    pattern: segment(
      `^(?<label>(?:(?:home|cell|mobile|work|daytime)\\s+)?(?:phone|telephone)(?:\\s+(?:number|no\\.|#))?)${PAREN_HINT}${FIELD_TAIL}`
    ),
    key: null,
    title: (match) => cleanLabel(match.groups?.label ?? 'Phone'),
    type: 'input',
    control: { input_type: 'phone', hint: null },
    scope: 'signature',
    markProcessed: false,
  },
  {
    name: 'state',
    pattern: segment(`^state${PAREN_HINT}${FIELD_TAIL}`),
    key: 'state',
    title: 'State',
    type: 'states',
    control: { hint: null },
    scope: 'any',
    markProcessed: true,
  },
  {
    name: 'labeled_blank',
    pattern: segment(
      `^(?!date\\b[ \\t]*:?[ \\t]*(?:_|\\.{4}|-{4}))(?![^_:\\n]*\\bsignatures?\\b)(?<label>[A-Za-z][A-Za-z0-9'’/&#.,()\\- ]{0,59}?)[ \\t]*:?[ \\t]*${BLANK_RUN}`
    ),
    key: null,
    title: (match) => cleanLabel(match.groups?.label ?? ''),
    type: 'input',
    control: (match) => ({ input_type: inferInputType(match.groups?.label ?? ''), hint: null }),
    scope: 'signature',
    markProcessed: false,
    fallback: true,
  },
];

// ============================================================================
// Block rules
// ============================================================================

export interface BlockLine {
  index: number;
  text: string;
}

export interface BlockMatch {
  /** Lines consumed, starting at the matched line */
  consumed: number;
  key: string | null;
  title: string;
  type: FieldType;
  options: ChoiceOption[];
}

export interface BlockRule {
  name: string;
  scope: RuleScope;
  match(lines: readonly BlockLine[], start: number): BlockMatch | null;
}

const GLYPH = String.raw`(?:[□■☐☑☒✅◉○◯]|\[\s*[xX✓✔]?\s*\]|\(\s*[xX✓✔]?\s*\))`;
const OPTION_LINE_RE = new RegExp(`^\\s*${GLYPH}\\s*(.+?)\\s*$`);
const GLYPH_SPLIT_RE = new RegExp(`\\s*${GLYPH}\\s*`);
const INLINE_YES_NO_RE = /^(.+?\?)\s*(?:_+\s*)?(yes)\s*(?:_+|\/|,)?\s*(no)\s*_*$/i;
const MAX_LABEL_LENGTH = 80;

const STATE_CODES: ReadonlySet<string> = new Set(usStates);
const MIN_STATE_CODES = 5;
const STATE_TOKEN_RATIO = 0.8;

function toOption(label: string): ChoiceOption | null {
  const cleaned = collapseWhitespace(label.replace(/_{2,}/g, ' '));
  return cleaned ? { value: slugify(cleaned), label: cleaned } : null;
}

function toOptions(labels: readonly string[]): ChoiceOption[] {
  return labels.map(toOption).filter((option): option is ChoiceOption => option !== null);
}

function optionLabel(text: string): string | null {
  const m = OPTION_LINE_RE.exec(text);
  return m ? m[1] : null;
}

/** Prompt and option labels when a line carries two or more glyph options */
function inlineOptions(text: string): { prompt: string; labels: string[] } | null {
  const parts = text.split(GLYPH_SPLIT_RE);
  if (parts.length < 3) {
    return null;
  }
  const [prompt, ...labels] = parts;
  return { prompt: prompt.trim(), labels };
}

function optionRun(lines: readonly BlockLine[], from: number): string[] {
  const labels: string[] = [];
  for (let i = from; i < lines.length; i++) {
    const label = optionLabel(lines[i].text);
    if (label === null || inlineOptions(lines[i].text)) {
      break;
    }
    labels.push(label);
  }
  return labels;
}

function questionTitle(text: string): string {
  return collapseWhitespace(text.replace(/\*\*/g, ''));
}

function labelTitle(text: string): string {
  return collapseWhitespace(text.replace(/\*\*/g, '')).replace(/:\s*$/, '');
}

function stateCodesIn(text: string): { codes: number; tokens: number } {
  const tokens = text.split(/[\s,;|/•·]+/).filter((token) => token.length > 0);
  return { codes: tokens.filter((token) => STATE_CODES.has(token)).length, tokens: tokens.length };
}

function isStateLine(text: string, minCodes: number): boolean {
  const { codes, tokens } = stateCodesIn(text);
  return codes >= minCodes && codes / tokens >= STATE_TOKEN_RATIO;
}

export const BLOCK_RULES: readonly BlockRule[] = [
  {
    name: 'radio_inline',
    scope: 'any',
    match: (lines, start) => {
      const text = lines[start].text.trim();
      const yesNo = INLINE_YES_NO_RE.exec(text);
      if (yesNo) {
        return {
          consumed: 1,
          key: null,
          title: questionTitle(yesNo[1]),
          type: 'radio',
          options: toOptions([yesNo[2], yesNo[3]]),
        };
      }
      const inline = inlineOptions(text);
      if (inline && inline.prompt.endsWith('?')) {
        return {
          consumed: 1,
          key: null,
          title: questionTitle(inline.prompt),
          type: 'radio',
          options: toOptions(inline.labels),
        };
      }
      return null;
    },
  },
  {
    name: 'radio_question',
    scope: 'any',
    match: (lines, start) => {
      const text = lines[start].text.trim();
      if (!text.endsWith('?') || start + 1 >= lines.length) {
        return null;
      }
      const next = inlineOptions(lines[start + 1].text);
      if (next && next.prompt === '') {
        return { consumed: 2, key: null, title: questionTitle(text), type: 'radio', options: toOptions(next.labels) };
      }
      const labels = optionRun(lines, start + 1);
      if (labels.length < 2) {
        return null;
      }
      return {
        consumed: 1 + labels.length,
        key: null,
        title: questionTitle(text),
        type: 'radio',
        options: toOptions(labels),
      };
    },
  },
  {
    name: 'state_list',
    scope: 'any',
    match: (lines, start) => {
      if (!isStateLine(lines[start].text, MIN_STATE_CODES)) {
        return null;
      }
      let consumed = 1;
      while (start + consumed < lines.length && isStateLine(lines[start + consumed].text, 1)) {
        consumed += 1;
      }
      return { consumed, key: 'state', title: 'State', type: 'states', options: [] };
    },
  },
  {
    name: 'checkbox_group',
    scope: 'any',
    match: (lines, start) => {
      const text = lines[start].text.trim();
      const inline = inlineOptions(text);
      if (inline) {
        return {
          consumed: 1,
          key: null,
          title: inline.prompt ? labelTitle(inline.prompt) : 'Options',
          type: 'checkbox',
          options: toOptions(inline.labels),
        };
      }
      if (text.endsWith(':') && text.length < MAX_LABEL_LENGTH) {
        const labels = optionRun(lines, start + 1);
        if (labels.length >= 2) {
          return {
            consumed: 1 + labels.length,
            key: null,
            title: labelTitle(text),
            type: 'checkbox',
            options: toOptions(labels),
          };
        }
        return null;
      }
      const labels = optionRun(lines, start);
      if (labels.length >= 2) {
        return { consumed: labels.length, key: null, title: 'Options', type: 'checkbox', options: toOptions(labels) };
      }
      return null;
    },
  },
];
