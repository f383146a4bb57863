/**
 * Stage 5: SignatureRoleFilter
 *
 * Drops witness, provider and guardian signature lines, promotes the
 * parent/guardian name to its own input field, removes leftover blank-fill
 * lines and, for consent-shaped documents, leaves exactly one `signature`
 * and one `date_signed` field.
 */

import { logger } from '../logger';
import type {
  CandidateField,
  ExtractedItem,
  NarrativeLine,
  PipelineContext,
  PipelineSettings,
} from './pipeline-context';
import { SIGNATURE_SECTION } from './section-classifier';
import { classifySignerRole, isDisallowedRole } from './signature-roles';
import { blankFillRatio } from './text-utils';

export const PARENT_GUARDIAN_KEY = 'parent_guardian_name';
export const SIGNATURE_KEY = 'signature';
export const DATE_SIGNED_KEY = 'date_signed';

export function isBlankArtifact(text: string, settings: PipelineSettings): boolean {
  return text.trim().length >= settings.blankLineMinLength && blankFillRatio(text) >= settings.blankLineRatio;
}

function parentGuardianField(lineIndex: number): CandidateField {
  return {
    key: PARENT_GUARDIAN_KEY,
    title: 'Parent/Guardian Name',
    section: SIGNATURE_SECTION,
    optional: true,
    type: 'input',
    control: { input_type: 'name', hint: null },
    lineIndex,
    origin: 'promoted',
    rule: 'guardian_name',
  };
}

function synthesizedSignature(): CandidateField {
  return {
    key: SIGNATURE_KEY,
    title: 'Signature',
    section: SIGNATURE_SECTION,
    optional: false,
    type: 'signature',
    control: {},
    lineIndex: Number.MAX_SAFE_INTEGER,
    origin: 'synthesized',
    rule: 'mandatory_signature',
  };
}

function synthesizedDateSigned(): CandidateField {
  return {
    key: DATE_SIGNED_KEY,
    title: 'Date Signed',
    section: SIGNATURE_SECTION,
    optional: false,
    type: 'date',
    control: { input_type: 'past', hint: null },
    lineIndex: Number.MAX_SAFE_INTEGER,
    origin: 'synthesized',
    rule: 'mandatory_date_signed',
  };
}

export class SignatureRoleFilter {
  private droppedLines = 0;
  private droppedFields = 0;

  constructor(private readonly context: PipelineContext) {}

  run(items: readonly ExtractedItem[], consentShaped: boolean): ExtractedItem[] {
    const filtered: ExtractedItem[] = [];

    for (const item of items) {
      if (item.kind === 'narrative') {
        const promoted: CandidateField[] = [];
        const lines = item.block.lines.filter((line) => this.keepLine(line, promoted));
        filtered.push({ kind: 'narrative', block: { section: item.block.section, lines } });
        for (const field of promoted) {
          filtered.push({ kind: 'field', field });
        }
        continue;
      }

      const field = this.filterField(item.field);
      if (field) {
        filtered.push({ kind: 'field', field });
      }
    }

    logger.debug('Signature roles filtered', {
      droppedLines: this.droppedLines,
      droppedFields: this.droppedFields,
    });

    return consentShaped ? this.enforceMandatoryFields(filtered) : filtered;
  }

  private promote(lineIndex: number): CandidateField | null {
    if (this.context.isProcessed(PARENT_GUARDIAN_KEY)) {
      return null;
    }
    this.context.markProcessed(PARENT_GUARDIAN_KEY);
    return parentGuardianField(lineIndex);
  }

  private keepLine(line: NarrativeLine, promoted: CandidateField[]): boolean {
    const role = classifySignerRole(line.text);
    if (role === 'guardian_name') {
      const field = this.promote(line.index);
      if (field) promoted.push(field);
      this.droppedLines += 1;
      return false;
    }
    if (isDisallowedRole(role) || isBlankArtifact(line.text, this.context.settings)) {
      this.droppedLines += 1;
      return false;
    }
    return true;
  }

  /** Only segment-matched inputs and signatures carry a signer label as their title */
  private filterField(field: CandidateField): CandidateField | null {
    if (field.origin !== 'segment' || (field.type !== 'input' && field.type !== 'signature')) {
      return field;
    }
    const role = classifySignerRole(field.title);
    if (role === 'guardian_name') {
      this.droppedFields += 1;
      return this.promote(field.lineIndex);
    }
    if (isDisallowedRole(role)) {
      this.droppedFields += 1;
      return null;
    }
    return field;
  }

  /**
   * First signature-typed field becomes `signature`, later ones are dropped;
   * missing `signature` and `date_signed` fields are synthesized.
   */
  private enforceMandatoryFields(items: ExtractedItem[]): ExtractedItem[] {
    let signatureSeen = false;
    let dateSignedSeen = false;
    const output: ExtractedItem[] = [];

    for (const item of items) {
      if (item.kind === 'field' && item.field.type === 'signature') {
        if (signatureSeen) {
          this.droppedFields += 1;
          continue;
        }
        signatureSeen = true;
        output.push({ kind: 'field', field: { ...item.field, key: SIGNATURE_KEY } });
        continue;
      }
      if (item.kind === 'field' && item.field.key === DATE_SIGNED_KEY) {
        dateSignedSeen = true;
      }
      output.push(item);
    }

    if (!signatureSeen) {
      output.push({ kind: 'field', field: synthesizedSignature() });
    }
    if (!dateSignedSeen) {
      output.push({ kind: 'field', field: synthesizedDateSigned() });
    }
    return output;
  }
}

export function filterSignatureRoles(
  items: readonly ExtractedItem[],
  context: PipelineContext,
  consentShaped: boolean
): ExtractedItem[] {
  return new SignatureRoleFilter(context).run(items, consentShaped);
}
