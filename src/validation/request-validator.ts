import { Ajv, type SchemaObject, type ValidateFunction } from 'ajv';
import { readFileSync } from 'fs';
import { join } from 'path';
import type { MessageCreateParams } from '../types/index.js';
import { PROJECT_ROOT } from '../infrastructure/config.js';

export const SCHEMAS_DIR = join(PROJECT_ROOT, 'schemas');

export interface ValidationResult {
  valid: boolean;
  data?: MessageCreateParams;
  errors?: string[];
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Structural checks on a Messages request before it is mapped. Presence and
 * types only; numeric ranges and model names are left to the upstream.
 */
class RequestValidator {
  private readonly ajv: Ajv;
  private readonly validator: ValidateFunction<MessageCreateParams>;

  constructor(schemasDir: string = SCHEMAS_DIR) {
    this.ajv = new Ajv({
      allErrors: true,
      removeAdditional: false,
      coerceTypes: false,
      strict: false
    });

    try {
      const schema: unknown = JSON.parse(readFileSync(join(schemasDir, 'message-create.schema.json'), 'utf8'));
      if (!isSchemaObject(schema)) {
        throw new Error('Schema root is not an object');
      }
      this.validator = this.ajv.compile<MessageCreateParams>(schema);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to initialize request validator: ${reason}`);
    }
  }

  validate(data: unknown): ValidationResult {
    if (data === null || data === undefined) {
      return { valid: false, errors: ['Request data is null or undefined'] };
    }

    if (this.validator(data)) {
      return { valid: true, data };
    }

    const errors = this.validator.errors?.map(error =>
      `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`
    ) ?? ['Unknown validation error'];
    return { valid: false, errors };
  }
}

let validatorInstance: RequestValidator | null = null;

function getValidator(): RequestValidator {
  if (!validatorInstance) {
    validatorInstance = new RequestValidator();
  }
  return validatorInstance;
}

export function validateMessageCreateParams(data: unknown): ValidationResult {
  return getValidator().validate(data);
}
