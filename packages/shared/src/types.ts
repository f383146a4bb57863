/**
 * Shared TypeScript Types
 *
 * Types for the form conversion pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Extracted Document (input)
// ============================================================================

export type SourceFormat = 'pdf' | 'docx' | 'text' | 'unknown';

/**
 * One line handed over by the text extraction collaborator.
 * Immutable once produced.
 */
export interface DocumentLine {
  readonly index: number;
  readonly text: string;
  readonly bold?: boolean;
  readonly sourceFormat?: SourceFormat;
}

export interface ExtractedDocument {
  document_id: string;
  /** Which extraction path populated the lines (OCR vs native); informational only */
  source_format: SourceFormat;
  lines: DocumentLine[];
}

// ============================================================================
// Field Records (output)
// ============================================================================

export type FieldType = 'input' | 'radio' | 'date' | 'signature' | 'text' | 'states' | 'checkbox';

export const FIELD_TYPES: readonly FieldType[] = [
  'input',
  'radio',
  'date',
  'signature',
  'text',
  'states',
  'checkbox',
];

export type InputType = 'name' | 'email' | 'phone' | 'number' | 'ssn' | 'zip' | 'initials';

export const INPUT_TYPES: readonly InputType[] = ['name', 'email', 'phone', 'number', 'ssn', 'zip', 'initials'];

export type DateInputType = 'past' | 'future';

export const DATE_INPUT_TYPES: readonly DateInputType[] = ['past', 'future'];

export interface ChoiceOption {
  value: string;
  label: string;
}

export interface InputControl {
  input_type: InputType | null;
  hint: string | null;
}

export interface ChoiceControl {
  options: ChoiceOption[];
  hint: string | null;
}

export interface DateControl {
  input_type: DateInputType;
  hint: string | null;
}

export interface SignatureControl {
  hint?: string | null;
}

export interface TextControl {
  html_text: string;
  hint?: string | null;
}

export interface StatesControl {
  options: ChoiceOption[];
  hint: string | null;
}

interface FieldBase {
  key: string;
  title: string;
  section: string;
  optional: boolean;
}

export type InputField = FieldBase & { type: 'input'; control: InputControl };
export type RadioField = FieldBase & { type: 'radio'; control: ChoiceControl };
export type CheckboxField = FieldBase & { type: 'checkbox'; control: ChoiceControl };
export type DateField = FieldBase & { type: 'date'; control: DateControl };
export type SignatureField = FieldBase & { type: 'signature'; control: SignatureControl };
export type TextField = FieldBase & { type: 'text'; control: TextControl };
export type StatesField = FieldBase & { type: 'states'; control: StatesControl };

export type FieldRecord =
  | InputField
  | RadioField
  | CheckboxField
  | DateField
  | SignatureField
  | TextField
  | StatesField;

export type ChoiceField = RadioField | CheckboxField;

/** Finalized, ordered, validated output handed to the writer */
export type SchemaDocument = readonly FieldRecord[];

// ============================================================================
// Form Classification
// ============================================================================

export type FormKind =
  | 'records_release'
  | 'structured_consent'
  | 'narrative_consent'
  | 'patient_info'
  | 'simple_form';

// ============================================================================
// Validation
// ============================================================================

export type ViolationSeverity = 'repairable' | 'fatal';

export type ViolationCode =
  | 'duplicate_key'
  | 'empty_key'
  | 'empty_section'
  | 'unknown_type'
  | 'missing_hint'
  | 'empty_options'
  | 'invalid_input_type'
  | 'missing_mandatory_field'
  | 'duplicate_mandatory_field'
  | 'schema_contract';

export interface Violation {
  code: ViolationCode;
  severity: ViolationSeverity;
  message: string;
  key?: string;
}

export type ValidationState = 'checked' | 'repaired' | 'final-pass' | 'accepted' | 'rejected';

export interface ValidationOutcome {
  valid: boolean;
  state: ValidationState;
  /** Every state the validator passed through, in order */
  transitions: ValidationState[];
  /** Violations fixed by the repair pass */
  repaired: Violation[];
  /** Violations still present when the validator stopped */
  violations: Violation[];
}

export interface PatternAmbiguityWarning {
  kind: 'pattern_ambiguity';
  line_index: number;
  text: string;
  chosen_rule: string;
  competing_rules: string[];
}

// ============================================================================
// Conversion Result
// ============================================================================

export interface ConversionResult {
  document_id: string;
  title: string;
  form_kind: FormKind;
  consent_shaped: boolean;
  fields: SchemaDocument;
  validation: ValidationOutcome;
  warnings: PatternAmbiguityWarning[];
  duration_ms: number;
}

// ============================================================================
// API Types
// ============================================================================

export interface ConvertRequest {
  document_id?: string;
  source_format?: SourceFormat;
  /** Either plain strings or full line objects */
  lines: Array<string | { text: string; bold?: boolean }>;
  consent_shaped?: boolean;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
    details?: unknown;
  };
}
