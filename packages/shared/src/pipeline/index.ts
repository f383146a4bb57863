/**
 * Field Extraction & Schema Normalization Pipeline
 *
 * Runs the eight stages in fixed order for one document. All mutable state
 * lives in the PipelineContext created here, so concurrent calls never share
 * anything.
 */

import { getCorrelationId, runWithContext } from '../context';
import { MalformedInputError, SchemaViolationError } from '../errors';
import { logger } from '../logger';
import {
  conversionDurationHistogram,
  documentsConvertedCounter,
  stageDurationHistogram,
  validationViolationsCounter,
} from '../metrics';
import type { ConversionResult, ExtractedDocument } from '../types';
import { assertWellFormed } from './document';
import { matchFields } from './field-matcher';
import { classifyForm, isConsentShaped, isFieldShaped } from './form-classifier';
import { filterHeaderFooter } from './header-footer';
import { normalizeItems } from './normalizer';
import { orderFields } from './ordering';
import { PipelineContext, type PipelineOptions } from './pipeline-context';
import { applyPlaceholders } from './placeholders';
import { classifySections } from './section-classifier';
import { filterSignatureRoles } from './signature-filter';
import { validateSchemaDocument } from './validator';

export type PipelineStage =
  | 'header_footer'
  | 'section_classifier'
  | 'field_matcher'
  | 'placeholders'
  | 'signature_roles'
  | 'normalizer'
  | 'ordering'
  | 'validator';

function timed<T>(stage: PipelineStage, fn: () => T): T {
  const end = stageDurationHistogram.startTimer({ stage });
  try {
    return fn();
  } finally {
    end();
  }
}

function runPipeline(document: ExtractedDocument, options: PipelineOptions): ConversionResult {
  const startTime = Date.now();
  const context = new PipelineContext(document.document_id, options);

  const lines = timed('header_footer', () => filterHeaderFooter(document.lines, context.settings));
  const classified = timed('section_classifier', () => classifySections(lines));
  const formKind = classifyForm(lines.map((line) => line.text));
  const consentShaped = isConsentShaped({
    kind: formKind,
    title: classified.title,
    hasSignatureCue: classified.hasSignatureCue,
    forced: context.forcedConsentShaped,
  });

  const extracted = timed('field_matcher', () =>
    matchFields(classified, context, { fieldShaped: isFieldShaped(formKind) })
  );
  const substituted = timed('placeholders', () => applyPlaceholders(extracted));
  const filtered = timed('signature_roles', () => filterSignatureRoles(substituted, context, consentShaped));
  const normalized = timed('normalizer', () => normalizeItems(filtered));
  const ordered = timed('ordering', () =>
    orderFields(normalized, context.referenceOrderings, context.settings.referenceOverlapThreshold)
  );
  const report = timed('validator', () => validateSchemaDocument(ordered.records, { consentShaped }));

  for (const violation of [...report.outcome.repaired, ...report.outcome.violations]) {
    validationViolationsCounter.inc({ code: violation.code, severity: violation.severity });
  }

  const durationMs = Date.now() - startTime;
  const status = report.outcome.valid ? 'accepted' : 'rejected';
  documentsConvertedCounter.inc({ form_kind: formKind, status });
  conversionDurationHistogram.observe({ status }, durationMs / 1000);

  if (!report.outcome.valid) {
    logger.warn('Document rejected by schema validator', {
      transitions: report.outcome.transitions,
      violations: report.outcome.violations.map((v) => v.code),
    });
    throw new SchemaViolationError({ documentId: document.document_id, violations: report.outcome.violations });
  }

  logger.info('Document converted', {
    title: classified.title,
    titleRule: classified.titleRule,
    formKind,
    consentShaped,
    fieldCount: report.records.length,
    reference: ordered.reference,
    repaired: report.outcome.repaired.length,
    warnings: context.warnings.length,
    durationMs,
  });

  return {
    document_id: document.document_id,
    title: classified.title,
    form_kind: formKind,
    consent_shaped: consentShaped,
    fields: report.records,
    validation: report.outcome,
    warnings: context.warnings,
    duration_ms: durationMs,
  };
}

/**
 * Convert one extracted document into a validated SchemaDocument.
 *
 * @throws MalformedInputError when the document carries no text
 * @throws SchemaViolationError when validation rejects the document
 */
export function convertDocument(document: ExtractedDocument, options: PipelineOptions = {}): ConversionResult {
  return runWithContext(
    {
      correlationId: getCorrelationId(),
      documentId: document.document_id,
      sourceFormat: document.source_format,
    },
    () => {
      try {
        assertWellFormed(document);
      } catch (error) {
        documentsConvertedCounter.inc({ form_kind: 'unknown', status: 'malformed' });
        throw error;
      }
      return runPipeline(document, options);
    }
  );
}

export type ConversionAttempt =
  | { ok: true; result: ConversionResult }
  | { ok: false; error: MalformedInputError | SchemaViolationError };

/**
 * Like convertDocument, but reports pipeline failures as values.
 * Unexpected errors still throw.
 */
export function tryConvertDocument(document: ExtractedDocument, options: PipelineOptions = {}): ConversionAttempt {
  try {
    return { ok: true, result: convertDocument(document, options) };
  } catch (error) {
    if (error instanceof MalformedInputError || error instanceof SchemaViolationError) {
      return { ok: false, error };
    }
    throw error;
  }
}

export { toExtractedDocument, fromPlainText, assertWellFormed } from './document';
export { filterHeaderFooter, detectSignals, removeBoilerplate, type BoilerplateSignal } from './header-footer';
export {
  classifySections,
  detectTitle,
  isSignatureCue,
  TITLE_RULES,
  FALLBACK_TITLE,
  SIGNATURE_SECTION,
  type ClassifiedDocument,
  type Section,
  type TitleRule,
} from './section-classifier';
export { matchFields, fieldChunks, FieldPatternMatcher, type MatchOptions } from './field-matcher';
export { SEGMENT_RULES, BLOCK_RULES, inferInputType, type SegmentRule, type BlockRule } from './field-rules';
export {
  substitutePlaceholders,
  applyPlaceholders,
  PLACEHOLDER_REGISTRY,
  PLACEHOLDER_TOKENS,
  type PlaceholderToken,
} from './placeholders';
export { classifySignerRole, isDisallowedRole, ROLE_INDICATORS, type SignerRole } from './signature-roles';
export {
  filterSignatureRoles,
  isBlankArtifact,
  SignatureRoleFilter,
  PARENT_GUARDIAN_KEY,
  SIGNATURE_KEY,
  DATE_SIGNED_KEY,
} from './signature-filter';
export { classifyForm, collectFormSignals, isConsentShaped, isFieldShaped, type FormSignals } from './form-classifier';
export { normalizeItems, normalizeField, dedupeOptions, normalizeInputType, STATE_OPTIONS } from './normalizer';
export { renderNarrativeHtml, escapeHtml } from './narrative-html';
export {
  orderFields,
  orderByCategory,
  orderByReference,
  selectReference,
  referenceOverlap,
  categoryOf,
  FIELD_CATEGORY,
  type FieldCategory,
  type OrderingResult,
} from './ordering';
export { validateSchemaDocument, checkDocument, repairDocument, type ValidationReport } from './validator';
export {
  PipelineContext,
  resolveSettings,
  DEFAULT_REFERENCE_ORDERINGS,
  type PipelineOptions,
  type PipelineSettings,
  type ReferenceOrdering,
  type CandidateField,
  type ExtractedItem,
  type NarrativeBlock,
  type NarrativeLine,
} from './pipeline-context';
export { slugify, uniqueKey, blankFillRatio } from './text-utils';
