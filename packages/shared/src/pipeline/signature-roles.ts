/**
 * Signer role indicators
 *
 * Phrases are matched against lowercased text with curly apostrophes
 * straightened and whitespace collapsed.
 */

import { countWords, hasBlankRun, normalizeForMatching } from './text-utils';

export type SignerRole = 'witness' | 'provider' | 'guardian_signature' | 'guardian_name';

export const ROLE_INDICATORS: Readonly<Record<SignerRole, readonly string[]>> = {
  witness: [
    'witness signature',
    "witness's signature",
    'witness name',
    "witness's name",
    'witnessed by',
    'signature of witness',
    'witness:',
    'witness printed name',
  ],
  provider: [
    'doctor signature',
    "doctor's signature",
    'dentist signature',
    "dentist's signature",
    'physician signature',
    "physician's signature",
    'provider signature',
    "provider's signature",
    'signature of doctor',
    'signature of dentist',
    'signature of provider',
    'dds signature',
    'dmd signature',
  ],
  guardian_signature: [
    'parent signature',
    "parent's signature",
    'guardian signature',
    "guardian's signature",
    'parent/guardian signature',
    "parent/guardian's signature",
    'patient/parent/guardian',
    'legally authorized representative',
    'signature of parent',
    'signature of guardian',
  ],
  guardian_name: [
    'parent/guardian name',
    "parent/guardian's name",
    'parent name',
    "parent's name",
    'guardian name',
    "guardian's name",
    'name of parent',
    'name of guardian',
    'parent or guardian name',
  ],
};

/** Name lines win over signature lines so the name can be promoted */
const ROLE_PRIORITY: readonly SignerRole[] = ['guardian_name', 'witness', 'provider', 'guardian_signature'];

const SIGNATURE_WORD_RE = /\bsignatures?\b/;
const REPRESENTATIVE_RE = /\b(?:parent|guardian|representative)s?\b/;
const MAX_LABEL_WORDS = 8;

/** Field labels and blanks, not sentences that merely mention a guardian */
function isLabelShaped(text: string): boolean {
  return hasBlankRun(text) || /:\s*$/.test(text) || countWords(text) <= MAX_LABEL_WORDS;
}

export function classifySignerRole(text: string): SignerRole | null {
  const normalized = normalizeForMatching(text);
  for (const role of ROLE_PRIORITY) {
    if (ROLE_INDICATORS[role].some((phrase) => normalized.includes(phrase))) {
      return role;
    }
  }
  // "Signature of Patient or Parent/Guardian", "Signature (Patient or Representative)"
  if (SIGNATURE_WORD_RE.test(normalized) && REPRESENTATIVE_RE.test(normalized) && isLabelShaped(text)) {
    return 'guardian_signature';
  }
  return null;
}

/** Witness, provider and guardian signatures are never emitted */
export function isDisallowedRole(role: SignerRole | null): boolean {
  return role === 'witness' || role === 'provider' || role === 'guardian_signature';
}
