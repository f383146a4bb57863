/**
 * Form classification
 *
 * Scores the document text against a few keyword families and picks a form
 * kind from an ordered decision table. The kind decides whether the
 * mandatory signature fields apply and where field rules run.
 */

import type { FormKind } from '../types';
import { hasBlankRun } from './text-utils';

export interface FormSignals {
  releaseHits: number;
  consentHits: number;
  patientInfoHits: number;
  fieldLines: number;
}

const RELEASE_RE =
  /\b(?:release|disclosure)\s+of\s+(?:(?:protected\s+)?(?:health\s+|medical\s+|dental\s+)?)(?:information|records)\b|\bHIPAA\b|\bauthori[sz]e\s+(?:the\s+)?(?:release|disclosure)\b/i;
const CONSENT_RE =
  /\bconsent\b|\bI\s+(?:understand|acknowledge|authori[sz]e|agree)\b|\brisks?\b|\bcomplications?\b|\bwarrant(?:y|ies)\b/i;
const PATIENT_INFO_RE =
  /\b(?:first\s+name|last\s+name|address|city|zip|phone|e-?mail|insurance|employer|emergency\s+contact|ssn|social\s+security|marital\s+status)\b/i;

const CONSENT_TITLE_RE = /\b(?:consent|agreement|authori[sz]ation|warranty|waiver|release)\b/i;

interface KindRule {
  kind: FormKind;
  when(signals: FormSignals): boolean;
}

const KIND_RULES: readonly KindRule[] = [
  { kind: 'records_release', when: (s) => s.releaseHits > 0 },
  { kind: 'patient_info', when: (s) => s.patientInfoHits >= 5 && s.patientInfoHits > s.consentHits },
  { kind: 'structured_consent', when: (s) => s.consentHits > 0 && s.fieldLines >= 3 },
  { kind: 'narrative_consent', when: (s) => s.consentHits > 0 },
];

const CONSENT_KINDS: ReadonlySet<FormKind> = new Set<FormKind>([
  'records_release',
  'structured_consent',
  'narrative_consent',
]);

/** Intake and simple forms put their fields in the body, not only under a signature cue */
const FIELD_SHAPED_KINDS: ReadonlySet<FormKind> = new Set<FormKind>(['patient_info', 'simple_form']);

export function collectFormSignals(lines: readonly string[]): FormSignals {
  const signals: FormSignals = { releaseHits: 0, consentHits: 0, patientInfoHits: 0, fieldLines: 0 };
  for (const line of lines) {
    if (RELEASE_RE.test(line)) signals.releaseHits += 1;
    if (CONSENT_RE.test(line)) signals.consentHits += 1;
    if (PATIENT_INFO_RE.test(line)) signals.patientInfoHits += 1;
    if (hasBlankRun(line)) signals.fieldLines += 1;
  }
  return signals;
}

export function classifyForm(lines: readonly string[]): FormKind {
  const signals = collectFormSignals(lines);
  return KIND_RULES.find((rule) => rule.when(signals))?.kind ?? 'simple_form';
}

export function isConsentShaped(params: {
  kind: FormKind;
  title: string;
  hasSignatureCue: boolean;
  forced?: boolean;
}): boolean {
  if (params.forced !== undefined) {
    return params.forced;
  }
  return CONSENT_KINDS.has(params.kind) || CONSENT_TITLE_RE.test(params.title) || params.hasSignatureCue;
}

export function isFieldShaped(kind: FormKind): boolean {
  return FIELD_SHAPED_KINDS.has(kind);
}
