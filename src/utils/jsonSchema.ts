import Ajv, { SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';

const ajv = new Ajv({ allErrors: true });
addFormats(ajv);

/**
 * Validates JSON data against a JSON schema
 * @param data - The data to validate
 * @param schema - The JSON schema to validate against
 * @returns Validation result with one line per error
 */
export function validateJsonSchema(
  data: unknown,
  schema: SchemaObject
): { valid: boolean; errors: string[] } {
  const validate = ajv.compile(schema);
  const valid = validate(data);

  if (!valid && validate.errors) {
    const errors = validate.errors.map(
      (err) => `${err.instancePath || '(root)'} ${err.message}`
    );
    return { valid: false, errors };
  }

  return { valid: true, errors: [] };
}

/**
 * Creates a reusable type guard for a specific schema
 */
export function createValidator<T>(schema: SchemaObject): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

/**
 * Validates and throws an error if validation fails
 * @param data - The data to validate
 * @param schema - The JSON schema describing `T`
 * @param label - Prefix for the error message, e.g. the request that produced the data
 * @throws Error with validation details if validation fails
 */
export function assertJsonSchema<T>(
  data: unknown,
  schema: SchemaObject,
  label = 'JSON Schema validation failed'
): asserts data is T {
  const result = validateJsonSchema(data, schema);
  if (!result.valid) {
    throw new Error(`${label}:\n${result.errors.join('\n')}`);
  }
}
