/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for the FormSpec output contract and the
 * inbound conversion payloads.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';
import type { ConvertFormJob } from './queues';
import type { ConvertRequest, FieldRecord } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

type ContractName = 'form_spec' | 'convert_request' | 'convert_form_job';

const PERMISSIVE_SCHEMAS: Record<ContractName, SchemaObject> = {
  form_spec: { type: 'array' },
  convert_request: { type: 'object' },
  convert_form_job: { type: 'object' },
};

function loadSchema(name: ContractName): SchemaObject {
  const schemaName = `${name}.schema.json`;
  const possiblePaths = [
    // Relative to shared package in development
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (for Docker containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
    // Absolute path fallback
    `/app/docs/contracts/${schemaName}`,
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      const parsed: SchemaObject = JSON.parse(content);
      return parsed;
    }
  }

  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return PERMISSIVE_SCHEMAS[name];
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

export type Parsed<T> = { valid: true; data: T } | { valid: false; errors: string[] };

/**
 * One JSON-schema contract, compiled lazily on first use
 */
class Contract<T> {
  private compiled: ValidateFunction<T> | null = null;

  constructor(
    private readonly name: ContractName,
    private readonly label: string
  ) {}

  private validator(): ValidateFunction<T> {
    if (!this.compiled) {
      this.compiled = ajv.compile<T>(loadSchema(this.name));
    }
    return this.compiled;
  }

  parse(data: unknown): Parsed<T> {
    const validate = this.validator();
    if (validate(data)) {
      return { valid: true, data };
    }
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`) ?? [];
    logger.debug(`${this.label} validation failed`, { errors });
    return { valid: false, errors };
  }

  check(data: unknown): ValidationResult {
    const parsed = this.parse(data);
    return parsed.valid ? { valid: true } : { valid: false, errors: parsed.errors };
  }
}

const formSpecContract = new Contract<FieldRecord[]>('form_spec', 'FormSpec');
const convertRequestContract = new Contract<ConvertRequest>('convert_request', 'ConvertRequest');
const convertFormJobContract = new Contract<ConvertFormJob>('convert_form_job', 'ConvertFormJob');

/**
 * Validate a finalized field array against form_spec.schema.json
 */
export function validateFormSpec(data: unknown): ValidationResult {
  return formSpecContract.check(data);
}

/**
 * Validate a POST /convert or POST /jobs body
 */
export function validateConvertRequest(data: unknown): ValidationResult {
  return convertRequestContract.check(data);
}

export function parseConvertRequest(data: unknown): Parsed<ConvertRequest> {
  return convertRequestContract.parse(data);
}

export function parseConvertFormJob(data: unknown): Parsed<ConvertFormJob> {
  return convertFormJobContract.parse(data);
}
