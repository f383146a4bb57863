/**
 * Stage 1: HeaderFooterFilter
 *
 * Strips practice letterhead and office contact boilerplate. A line is only
 * treated as boilerplate when it sits in the header/footer window and carries
 * a signal, or carries several distinct signals anywhere in the document.
 * Mixed lines lose the boilerplate segment and keep the rest at the same
 * position when the rest reads as form content or as a sentence.
 */

import type { DocumentLine } from '../types';
import type { PipelineSettings } from './pipeline-context';
import { countWords, hasBlankRun, stripMarkup } from './text-utils';

export type BoilerplateSignal =
  | 'phone'
  | 'email'
  | 'url'
  | 'street_address'
  | 'city_state_zip'
  | 'letterhead'
  | 'office_label';

interface SignalPattern {
  signal: BoilerplateSignal;
  pattern: RegExp;
  /** Whole-line patterns remove the entire line when they match */
  wholeLine?: boolean;
}

const STREET_SUFFIX =
  'Street|St|Avenue|Ave|Road|Rd|Boulevard|Blvd|Drive|Dr|Lane|Ln|Way|Court|Ct|Parkway|Pkwy|Highway|Hwy|Place|Pl|Circle|Cir|Terrace|Trail';

const PRACTICE_WORD =
  'Dental|Dentistry|Orthodontics|Endodontics|Periodontics|Implant\\s+Center|Oral\\s+Surgery|Smiles?';

const PRACTICE_SUFFIX =
  'Care|Group|Associates|Office|Center|Centre|Studio|Clinic|Practice|Arts|Spa|Partners|PC|P\\.C\\.|PLLC|LLC|Inc\\.?';

const SIGNAL_PATTERNS: readonly SignalPattern[] = [
  {
    signal: 'phone',
    pattern: /(?:\+?1[\s.-]?)?(?:\(\d{3}\)|\b\d{3})[\s.-]?\d{3}[\s.-]\d{4}\b/g,
  },
  { signal: 'email', pattern: /\b[\w.+-]+@[\w-]+(?:\.[\w-]+)+\b/g },
  { signal: 'url', pattern: /\b(?:https?:\/\/|www\.)[^\s,;|•]+/gi },
  {
    signal: 'street_address',
    pattern: new RegExp(
      `\\b\\d{1,6}\\s+(?:[A-Z0-9][\\w.'-]*\\s+){1,4}(?:${STREET_SUFFIX})\\b\\.?(?:,?\\s*(?:Suite|Ste|Unit|#)\\.?\\s*[\\w-]+)?`,
      'g'
    ),
  },
  {
    signal: 'city_state_zip',
    pattern: /\b[A-Z][a-zA-Z.'-]*(?:\s+[A-Z][a-zA-Z.'-]*)*,\s*[A-Z]{2}\s+\d{5}(?:-\d{4})?\b/g,
  },
  {
    signal: 'letterhead',
    pattern: new RegExp(
      `^(?:(?:[A-Z][\\w'&.-]*|&)\\s+){0,5}(?:${PRACTICE_WORD})(?:\\s+(?:${PRACTICE_SUFFIX}))*$|^practice\\s+name$`,
      'i'
    ),
    wholeLine: true,
  },
  { signal: 'office_label', pattern: /\b(?:Office|Fax|Tel)\s*[:#]/gi },
];

/** Keywords that keep a short residual alive */
const FORM_CONTENT_RE =
  /\b(?:consent|form|agreement|authori[sz]ation|release|policy|treatment|patient|procedure|warranty|instructions)\b/i;

const SENTENCE_END_RE = /[A-Za-z0-9)]\s*[.!?]$/;
const MIN_SENTENCE_WORDS = 2;

const DANGLING_LABEL_RE = /\b(?:Phone|Tel|Fax|Office|E-?mail|Web(?:site)?|Address)\s*[:#]?\s*(?=$|[•|·,])/gi;
const SEPARATOR_RE = /\s*[•|·]\s*/g;
const EDGE_PUNCTUATION_RE = /^[\s,;:•|·-]+|[\s,;:•|·-]+$/g;

function segmentsOf(text: string): string[] {
  return text
    .split(SEPARATOR_RE)
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);
}

function isLetterheadSegment(segment: string): boolean {
  return SIGNAL_PATTERNS.some(({ pattern, wholeLine }) => wholeLine === true && pattern.test(segment));
}

export function detectSignals(text: string): BoilerplateSignal[] {
  const plain = stripMarkup(text);
  const found: BoilerplateSignal[] = [];
  for (const { signal, pattern, wholeLine } of SIGNAL_PATTERNS) {
    const matched = wholeLine
      ? segmentsOf(plain).some((segment) => pattern.test(segment))
      : plain.search(pattern) !== -1;
    if (matched) {
      found.push(signal);
    }
  }
  return found;
}

/**
 * Remove every boilerplate segment and tidy what is left
 */
export function removeBoilerplate(text: string): string {
  let residual = stripMarkup(text);
  for (const { pattern, wholeLine } of SIGNAL_PATTERNS) {
    if (!wholeLine) {
      residual = residual.replace(pattern, ' ');
    }
  }
  return segmentsOf(residual.replace(DANGLING_LABEL_RE, ' '))
    .map((segment) => segment.replace(/\s{2,}/g, ' ').replace(EDGE_PUNCTUATION_RE, ''))
    .filter((segment) => segment.length > 0 && !isLetterheadSegment(segment))
    .join(' | ');
}

/** A residual that still reads as a sentence, e.g. "Call with questions." */
function isSentence(residual: string): boolean {
  return SENTENCE_END_RE.test(residual) && countWords(residual) >= MIN_SENTENCE_WORDS;
}

function isMeaningfulResidual(residual: string, settings: PipelineSettings): boolean {
  if (residual.length === 0) {
    return false;
  }
  return (
    FORM_CONTENT_RE.test(residual) ||
    isSentence(residual) ||
    countWords(residual) >= settings.headerFooterMinResidualWords
  );
}

export function filterHeaderFooter(
  lines: readonly DocumentLine[],
  settings: PipelineSettings
): DocumentLine[] {
  const content = lines.filter((line) => line.text.trim().length > 0);
  const window = Math.max(0, settings.headerFooterWindow);
  const output: DocumentLine[] = [];

  content.forEach((line, position) => {
    const inWindow = position < window || position >= content.length - window;
    // Blank-fill runs mark a field line, never letterhead
    const signals = hasBlankRun(line.text) ? [] : detectSignals(line.text);
    const isBoilerplate =
      (inWindow && signals.length > 0) || signals.length >= settings.headerFooterMinSignals;

    if (!isBoilerplate) {
      output.push(line);
      return;
    }

    const residual = removeBoilerplate(line.text);
    if (isMeaningfulResidual(residual, settings)) {
      output.push({ ...line, text: residual });
    }
  });

  return output;
}
