/**
 * Stage 2: SectionClassifier
 *
 * Detects the document title from the first content line through an ordered
 * rule table, then splits the remaining lines into sections at later
 * markdown headers and at the start of the signature block.
 */

import type { DocumentLine } from '../types';
import { collapseWhitespace } from './text-utils';

export const FALLBACK_TITLE = 'Form';
export const SIGNATURE_SECTION = 'Signature';

const MAX_TITLE_LENGTH = 150;

const CONSENT_KEYWORD_RE =
  /\b(?:CONSENT|AGREEMENT|AUTHORI[SZ]ATION|RELEASE|WAIVER|POLICY|FORM|WARRANTY|ACKNOWLEDG\w*)\b/;

export interface TitleRule {
  name: string;
  /** Title text when the rule accepts the line, otherwise null */
  match(line: DocumentLine): string | null;
}

function cleanTitle(text: string): string {
  return collapseWhitespace(text.replace(/\*\*/g, '').replace(/[:\s]+$/, ''));
}

export const TITLE_RULES: readonly TitleRule[] = [
  {
    name: 'markdown_header',
    match: (line) => {
      const m = /^#{1,6}\s+(.+?)\s*#*\s*$/.exec(line.text.trim());
      return m ? cleanTitle(m[1]) : null;
    },
  },
  {
    name: 'bold_wrapped',
    match: (line) => {
      const text = line.text.trim();
      const m = /^\*\*(.+?)\*\*$/.exec(text);
      if (m) {
        return m[1].trim().length < MAX_TITLE_LENGTH ? cleanTitle(m[1]) : null;
      }
      return line.bold === true && text.length < MAX_TITLE_LENGTH ? cleanTitle(text) : null;
    },
  },
  {
    name: 'all_caps_keyword',
    match: (line) => {
      const text = line.text.trim();
      const isAllCaps = /[A-Z]/.test(text) && text === text.toUpperCase();
      return isAllCaps && CONSENT_KEYWORD_RE.test(text) ? cleanTitle(text) : null;
    },
  },
  {
    name: 'informed_consent_suffix',
    match: (line) => {
      const text = line.text.trim();
      return text.length < MAX_TITLE_LENGTH && /^(.+?)\s+informed\s+consent$/i.test(text)
        ? cleanTitle(text)
        : null;
    },
  },
  {
    name: 'informed_consent_prefix',
    match: (line) => {
      const text = line.text.trim();
      return text.length < MAX_TITLE_LENGTH && /^informed\s+consent\s+for\s+\S/i.test(text)
        ? cleanTitle(text)
        : null;
    },
  },
];

const SECTION_HEADER_RE = /^#{1,2}\s+(.+?)\s*#*\s*$/;

const SIGNATURE_CUE_PATTERNS: readonly RegExp[] = [
  /^(?:\*\*)?(?:patient(?:['’]s)?\s+)?signatures?\b/i,
  /\bpatient(?:['’]s)?\s+signature\b/i,
  /\bsignature\s+of\s+(?:the\s+)?patient\b/i,
];

export function isSignatureCue(text: string): boolean {
  const trimmed = text.trim();
  return SIGNATURE_CUE_PATTERNS.some((pattern) => pattern.test(trimmed));
}

export interface Section {
  name: string;
  ordinal: number;
  lines: DocumentLine[];
}

export interface ClassifiedDocument {
  title: string;
  titleRule: string;
  hasSignatureCue: boolean;
  sections: Section[];
}

export function detectTitle(lines: readonly DocumentLine[]): { title: string; rule: string; consumed: boolean } {
  const first = lines[0];
  if (first) {
    for (const rule of TITLE_RULES) {
      const title = rule.match(first);
      if (title) {
        return { title, rule: rule.name, consumed: true };
      }
    }
  }
  return { title: FALLBACK_TITLE, rule: 'fallback', consumed: false };
}

export function classifySections(lines: readonly DocumentLine[]): ClassifiedDocument {
  const { title, rule, consumed } = detectTitle(lines);
  const sections: Section[] = [{ name: title, ordinal: 0, lines: [] }];
  let current = sections[0];
  let hasSignatureCue = false;

  const open = (name: string): void => {
    current = { name, ordinal: sections.length, lines: [] };
    sections.push(current);
  };

  for (const line of consumed ? lines.slice(1) : lines) {
    const header = SECTION_HEADER_RE.exec(line.text.trim());
    if (header) {
      open(collapseWhitespace(header[1].replace(/\*\*/g, '')));
      continue;
    }
    if (!hasSignatureCue && isSignatureCue(line.text)) {
      hasSignatureCue = true;
      if (current.name !== SIGNATURE_SECTION) {
        open(SIGNATURE_SECTION);
      }
    }
    current.lines.push(line);
  }

  return {
    title,
    titleRule: rule,
    hasSignatureCue,
    sections: sections.filter((section) => section.lines.length > 0),
  };
}
