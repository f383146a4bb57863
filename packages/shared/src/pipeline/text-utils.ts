/**
 * Text helpers shared by the pipeline stages
 */

/** One blank-fill run: underscores, dot leaders or dash leaders */
const BLANK_UNIT = String.raw`(?:_{2,}|\.{4,}|-{4,}|…{2,})`;

/** Consecutive blank-fill runs separated by spaces or tabs */
export const BLANK_RUN = String.raw`${BLANK_UNIT}(?:[ \t]*${BLANK_UNIT})*`;

/** Field tail: a colon with an optional blank run, or a bare blank run */
export const FIELD_TAIL = String.raw`[ \t]*(?::[ \t]*(?:${BLANK_RUN})?|${BLANK_RUN})`;

/** Short parenthesized hint after a label, e.g. "(print)" or "(MM/DD/YYYY)" */
export const PAREN_HINT = String.raw`(?:[ \t]*\([^)\n]{1,30}\))?`;

const BLANK_RUN_RE = new RegExp(BLANK_RUN);
const BLANK_FILL_CHAR_RE = /[_.\-…\s]/;
const POSSESSIVE_RE = /['’]s\b/gi;
const COMBINING_MARKS_RE = /[\u0300-\u036f]/g;
const MAX_KEY_LENGTH = 60;

export function hasBlankRun(text: string): boolean {
  return BLANK_RUN_RE.test(text);
}

/**
 * Share of characters in the trimmed line that are blank-fill characters
 * (underscores, dots, dashes, ellipses and whitespace)
 */
export function blankFillRatio(text: string): number {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return 0;
  }
  let fill = 0;
  for (const char of trimmed) {
    if (BLANK_FILL_CHAR_RE.test(char)) {
      fill += 1;
    }
  }
  return fill / [...trimmed].length;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Lowercase, curly apostrophes straightened, whitespace collapsed */
export function normalizeForMatching(text: string): string {
  return collapseWhitespace(text.replace(/[’‘]/g, "'").toLowerCase());
}

/** Remove markdown header and emphasis markers */
export function stripMarkup(text: string): string {
  return text
    .replace(/^#{1,6}\s+/, '')
    .replace(/\*\*/g, '')
    .trim();
}

export function countWords(text: string): number {
  return (text.match(/[A-Za-z0-9][\w'’-]*/g) ?? []).length;
}

/**
 * Convert a title to a field key.
 *
 * "Patient's Name" -> "patient_name", "Relationship to Patient" -> "relationship_to_patient"
 */
export function slugify(text: string): string {
  const slug = text
    .normalize('NFKD')
    .replace(COMBINING_MARKS_RE, '')
    .replace(POSSESSIVE_RE, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, MAX_KEY_LENGTH)
    .replace(/_+$/, '');
  return slug || 'field';
}

/**
 * Pick `base`, or the first of `base_2`, `base_3`, ... that is not taken
 */
export function uniqueKey(base: string, taken: ReadonlySet<string>): string {
  if (!taken.has(base)) {
    return base;
  }
  let n = 2;
  while (taken.has(`${base}_${n}`)) {
    n += 1;
  }
  return `${base}_${n}`;
}
