/**
 * Per-document pipeline state
 *
 * Every convertDocument call owns one PipelineContext. Registries that the
 * stages share (processed keys, warnings, reference orderings, tunables) live
 * here and never at module scope, so documents can be converted concurrently.
 */

import { config } from '../config';
import referenceOrderingsData from '../data/reference-orderings.json';
import { logger } from '../logger';
import type { ChoiceOption, FieldType, PatternAmbiguityWarning } from '../types';

export interface ReferenceOrdering {
  name: string;
  keys: string[];
}

export const DEFAULT_REFERENCE_ORDERINGS: readonly ReferenceOrdering[] = referenceOrderingsData.orderings;

/**
 * Tunables, all overridable per call
 */
export interface PipelineSettings {
  /** First/last N non-empty lines treated as header/footer position */
  headerFooterWindow: number;
  /** Distinct boilerplate signal families that mark a line anywhere in the document */
  headerFooterMinSignals: number;
  /** Words a residual needs to survive when it carries no form-content keyword */
  headerFooterMinResidualWords: number;
  blankLineMinLength: number;
  blankLineRatio: number;
  referenceOverlapThreshold: number;
}

export interface PipelineOptions extends Partial<PipelineSettings> {
  /** Force the consent-shaped decision instead of deriving it */
  consentShaped?: boolean;
  referenceOrderings?: readonly ReferenceOrdering[];
}

export function resolveSettings(options: PipelineOptions = {}): PipelineSettings {
  return {
    headerFooterWindow: options.headerFooterWindow ?? config.headerFooterWindow,
    headerFooterMinSignals: options.headerFooterMinSignals ?? config.headerFooterMinSignals,
    headerFooterMinResidualWords:
      options.headerFooterMinResidualWords ?? config.headerFooterMinResidualWords,
    blankLineMinLength: options.blankLineMinLength ?? config.blankLineMinLength,
    blankLineRatio: options.blankLineRatio ?? config.blankLineRatio,
    referenceOverlapThreshold: options.referenceOverlapThreshold ?? config.referenceOverlapThreshold,
  };
}

// ============================================================================
// Intermediate records passed between stages
// ============================================================================

/** Control payload before normalization; every member may still be missing */
export interface CandidateControl {
  input_type?: string | null;
  hint?: string | null;
  options?: ChoiceOption[];
}

export type CandidateOrigin = 'segment' | 'block' | 'promoted' | 'synthesized';

export interface CandidateField {
  /** Fixed key from a rule, or null to derive it from the title */
  key: string | null;
  title: string;
  section: string;
  optional: boolean;
  type: FieldType;
  control: CandidateControl;
  lineIndex: number;
  origin: CandidateOrigin;
  rule: string;
}

export interface NarrativeLine {
  index: number;
  text: string;
  bold: boolean;
}

/** Narrative text of one section, rendered to a single text record */
export interface NarrativeBlock {
  section: string;
  lines: NarrativeLine[];
}

export type ExtractedItem =
  | { kind: 'field'; field: CandidateField }
  | { kind: 'narrative'; block: NarrativeBlock };

// ============================================================================
// Context
// ============================================================================

export class PipelineContext {
  readonly documentId: string;
  readonly settings: PipelineSettings;
  readonly referenceOrderings: readonly ReferenceOrdering[];
  readonly forcedConsentShaped: boolean | undefined;

  private readonly processedKeys = new Set<string>();
  private readonly ambiguityWarnings: PatternAmbiguityWarning[] = [];

  constructor(documentId: string, options: PipelineOptions = {}) {
    this.documentId = documentId;
    this.settings = resolveSettings(options);
    this.referenceOrderings = options.referenceOrderings ?? DEFAULT_REFERENCE_ORDERINGS;
    this.forcedConsentShaped = options.consentShaped;
  }

  isProcessed(key: string): boolean {
    return this.processedKeys.has(key);
  }

  markProcessed(key: string): void {
    this.processedKeys.add(key);
  }

  addWarning(warning: PatternAmbiguityWarning): void {
    this.ambiguityWarnings.push(warning);
    logger.debug('Pattern ambiguity resolved by priority', {
      lineIndex: warning.line_index,
      chosenRule: warning.chosen_rule,
      competingRules: warning.competing_rules,
    });
  }

  get warnings(): PatternAmbiguityWarning[] {
    return [...this.ambiguityWarnings];
  }
}
