/**
 * Stage 8: SchemaValidator
 *
 * Final gate over the ordered records. The run is a small state machine:
 *
 *   checked -> accepted | rejected
 *   checked -> repaired -> final-pass -> accepted | rejected
 *
 * Repair happens at most once. Any fatal violation on the first check
 * rejects the document without repairing it.
 */

import { validateFormSpec } from '../schemas';
import {
  DATE_INPUT_TYPES,
  FIELD_TYPES,
  type FieldRecord,
  type ValidationOutcome,
  type ValidationState,
  type Violation,
  type ViolationCode,
} from '../types';
import { SIGNATURE_SECTION } from './section-classifier';
import { DATE_SIGNED_KEY, SIGNATURE_KEY } from './signature-filter';
import { uniqueKey } from './text-utils';

export interface ValidatorOptions {
  consentShaped: boolean;
}

export interface ValidationReport {
  outcome: ValidationOutcome;
  /** Records after repair; equal to the input when nothing was repaired */
  records: FieldRecord[];
}

const MANDATORY_KEYS: readonly string[] = [SIGNATURE_KEY, DATE_SIGNED_KEY];

const TRANSITIONS: Readonly<Record<ValidationState, readonly ValidationState[]>> = {
  checked: ['repaired', 'accepted', 'rejected'],
  repaired: ['final-pass'],
  'final-pass': ['accepted', 'rejected'],
  accepted: [],
  rejected: [],
};

class ValidationRun {
  private current: ValidationState = 'checked';
  readonly transitions: ValidationState[] = ['checked'];

  get state(): ValidationState {
    return this.current;
  }

  moveTo(next: ValidationState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal validator transition ${this.current} -> ${next}`);
    }
    this.current = next;
    this.transitions.push(next);
  }
}

function fatal(code: ViolationCode, message: string, key?: string): Violation {
  return { code, severity: 'fatal', message, key };
}

function repairable(code: ViolationCode, message: string, key?: string): Violation {
  return { code, severity: 'repairable', message, key };
}

function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim().length === 0;
}

function checkRecord(record: FieldRecord): Violation[] {
  const violations: Violation[] = [];
  const key = record.key;

  if (isBlank(record.key)) violations.push(fatal('empty_key', 'Record has an empty key'));
  if (isBlank(record.section)) violations.push(fatal('empty_section', `Record ${key} has an empty section`, key));
  if (!FIELD_TYPES.includes(record.type)) {
    violations.push(fatal('unknown_type', `Record ${key} has unknown type ${String(record.type)}`, key));
    return violations;
  }

  switch (record.type) {
    case 'radio':
    case 'checkbox':
    case 'states':
      if (!Array.isArray(record.control.options) || record.control.options.length === 0) {
        violations.push(fatal('empty_options', `Choice record ${key} has no options`, key));
      }
      break;
    case 'date':
      if (!DATE_INPUT_TYPES.includes(record.control.input_type)) {
        violations.push(fatal('invalid_input_type', `Date record ${key} has input_type ${String(record.control.input_type)}`, key));
      }
      break;
    default:
      break;
  }

  if (record.control.hint === undefined) {
    violations.push(repairable('missing_hint', `Record ${key} has no hint`, key));
  }
  return violations;
}

/**
 * Structural checks, then the JSON-schema contract once the structure is clean
 */
export function checkDocument(records: readonly FieldRecord[], options: ValidatorOptions): Violation[] {
  const violations = records.flatMap(checkRecord);

  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record.key, (counts.get(record.key) ?? 0) + 1);
  }
  for (const [key, count] of counts) {
    if (count < 2) continue;
    violations.push(
      MANDATORY_KEYS.includes(key)
        ? fatal('duplicate_mandatory_field', `Mandatory field ${key} appears ${count} times`, key)
        : repairable('duplicate_key', `Key ${key} appears ${count} times`, key)
    );
  }

  if (options.consentShaped) {
    for (const key of MANDATORY_KEYS) {
      if (!counts.has(key)) {
        violations.push(repairable('missing_mandatory_field', `Consent-shaped document lacks ${key}`, key));
      }
    }
  }

  if (violations.length === 0) {
    const contract = validateFormSpec(records);
    for (const error of contract.errors ?? []) {
      violations.push(fatal('schema_contract', error));
    }
  }

  return violations;
}

function withKey<T extends FieldRecord>(record: T, key: string): T {
  return { ...record, key };
}

function withHint<T extends FieldRecord>(record: T): T {
  return { ...record, control: { ...record.control, hint: record.control.hint ?? null } };
}

function mandatoryRecord(key: string): FieldRecord {
  if (key === SIGNATURE_KEY) {
    return {
      key,
      title: 'Signature',
      section: SIGNATURE_SECTION,
      optional: false,
      type: 'signature',
      control: { hint: null },
    };
  }
  return {
    key,
    title: 'Date Signed',
    section: SIGNATURE_SECTION,
    optional: false,
    type: 'date',
    control: { input_type: 'past', hint: null },
  };
}

/**
 * Fix every repairable violation: default hints, suffix duplicate keys,
 * add missing mandatory fields (signature ahead of date_signed).
 */
export function repairDocument(records: readonly FieldRecord[], options: ValidatorOptions): FieldRecord[] {
  const taken = new Set(records.map((record) => record.key));
  const seen = new Set<string>();

  const repaired = records.map((record) => {
    const hinted = withHint(record);
    if (!seen.has(hinted.key)) {
      seen.add(hinted.key);
      return hinted;
    }
    const key = uniqueKey(hinted.key, taken);
    taken.add(key);
    return withKey(hinted, key);
  });

  if (options.consentShaped) {
    if (!taken.has(SIGNATURE_KEY)) {
      const dateAt = repaired.findIndex((record) => record.key === DATE_SIGNED_KEY);
      repaired.splice(dateAt === -1 ? repaired.length : dateAt, 0, mandatoryRecord(SIGNATURE_KEY));
    }
    if (!taken.has(DATE_SIGNED_KEY)) {
      const signatureAt = repaired.findIndex((record) => record.key === SIGNATURE_KEY);
      repaired.splice(signatureAt + 1, 0, mandatoryRecord(DATE_SIGNED_KEY));
    }
  }

  return repaired;
}

export function validateSchemaDocument(
  records: readonly FieldRecord[],
  options: ValidatorOptions
): ValidationReport {
  const run = new ValidationRun();
  const first = checkDocument(records, options);

  const finish = (
    state: 'accepted' | 'rejected',
    output: readonly FieldRecord[],
    repaired: Violation[],
    violations: Violation[]
  ): ValidationReport => {
    run.moveTo(state);
    return {
      outcome: { valid: state === 'accepted', state: run.state, transitions: run.transitions, repaired, violations },
      records: [...output],
    };
  };

  if (first.length === 0) {
    return finish('accepted', records, [], []);
  }
  if (first.some((violation) => violation.severity === 'fatal')) {
    return finish('rejected', records, [], first);
  }

  const repairedRecords = repairDocument(records, options);
  run.moveTo('repaired');
  run.moveTo('final-pass');

  const second = checkDocument(repairedRecords, options);
  return second.length === 0
    ? finish('accepted', repairedRecords, first, [])
    : finish('rejected', repairedRecords, first, second);
}
