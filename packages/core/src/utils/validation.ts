/**
 * Validation utilities
 *
 * A small JSON Schema subset: type, properties, required, items, enum,
 * minimum and maximum. Enough for tool argument checks.
 */

import type {
  JSONSchema,
  PromptArgument,
  ValidationError,
  ValidationResult,
} from '../types/public-api.js';

/**
 * Validate input against JSON Schema
 */
export function validateInput(input: unknown, schema: JSONSchema): ValidationResult {
  const errors: ValidationError[] = [];

  // Validate object type - reject null and arrays explicitly
  if (schema.type === 'object') {
    if (input === null) {
      errors.push({ path: '', message: 'Expected object, got null' });
      return { valid: false, errors };
    }
    if (Array.isArray(input)) {
      errors.push({ path: '', message: 'Expected object, got array' });
      return { valid: false, errors };
    }
    if (!isRecord(input)) {
      errors.push({ path: '', message: `Expected object, got ${typeof input}` });
      return { valid: false, errors };
    }

    // Check required fields
    for (const field of schema.required ?? []) {
      if (!(field in input) || input[field] === undefined) {
        errors.push({ path: field, message: `Missing required field: ${field}` });
      }
    }

    // Validate each property
    for (const [key, value] of Object.entries(input)) {
      const propSchema = schema.properties?.[key];
      if (propSchema) {
        prefixErrors(errors, key, validateInput(value, propSchema));
      }
    }
  }

  if (schema.type === 'string' && typeof input !== 'string') {
    errors.push({ path: '', message: `Expected string, got ${describe(input)}` });
  }

  if (schema.type === 'number' && (typeof input !== 'number' || !Number.isFinite(input))) {
    errors.push({ path: '', message: `Expected number, got ${describe(input)}` });
  }

  if (schema.type === 'integer' && !Number.isInteger(input)) {
    errors.push({ path: '', message: `Expected integer, got ${describe(input)}` });
  }

  if (schema.type === 'boolean' && typeof input !== 'boolean') {
    errors.push({ path: '', message: `Expected boolean, got ${describe(input)}` });
  }

  if (schema.type === 'array') {
    if (!Array.isArray(input)) {
      errors.push({ path: '', message: `Expected array, got ${describe(input)}` });
    } else if (schema.items) {
      const itemSchema = schema.items;
      input.forEach((item: unknown, index) => {
        prefixErrors(errors, String(index), validateInput(item, itemSchema));
      });
    }
  }

  if (typeof input === 'number') {
    if (schema.minimum !== undefined && input < schema.minimum) {
      errors.push({ path: '', message: `Must be >= ${schema.minimum}` });
    }
    if (schema.maximum !== undefined && input > schema.maximum) {
      errors.push({ path: '', message: `Must be <= ${schema.maximum}` });
    }
  }

  if (schema.enum && !schema.enum.includes(input)) {
    errors.push({ path: '', message: `Value must be one of: ${schema.enum.join(', ')}` });
  }

  return {
    valid: errors.length === 0,
    errors: errors.length > 0 ? errors : undefined,
  };
}

/**
 * Validate prompt arguments: required ones present, all of them strings
 */
export function validatePromptArguments(
  args: Record<string, unknown>,
  declared: PromptArgument[] = []
): ValidationResult {
  const errors: ValidationError[] = [];

  for (const arg of declared) {
    // == null keeps empty strings valid
    if (arg.required && args[arg.name] == null) {
      errors.push({ path: arg.name, message: `Missing required argument: ${arg.name}` });
    }
  }

  for (const [key, value] of Object.entries(args)) {
    if (typeof value !== 'string') {
      errors.push({ path: key, message: `Expected string, got ${describe(value)}` });
    }
  }

  return {
    valid: errors.length === 0,
    errors: errors.length > 0 ? errors : undefined,
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function prefixErrors(errors: ValidationError[], key: string, result: ValidationResult): void {
  for (const err of result.errors ?? []) {
    errors.push({
      path: err.path ? `${key}.${err.path}` : key,
      message: err.message,
    });
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export const validation = {
  validateInput,
  validatePromptArguments,
};
