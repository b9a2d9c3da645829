import type { StandardSchemaV1 } from '@standard-schema/spec';

/**
 * Runs a Standard Schema V1 validator synchronously and returns its output.
 *
 * Intended for constructors and setters that must receive a valid value and
 * abort otherwise:
 *
 * ```ts
 * const money = validateWithSchema(moneySchema, input, 'Invoice.total');
 * ```
 *
 * About `~standard`:
 * The validator is reached through the `~standard` property only, so any
 * compliant schema works (a coercion schema, Zod, Valibot, ...).
 *
 * @param schema - The schema instance (must contain `~standard`).
 * @param input - The raw value.
 * @param label - Name of the validated parameter, used in error messages.
 * @returns The validated (and possibly coerced) value.
 *
 * @throws
 * - If the schema object is invalid (missing `~standard`).
 * - If the validator returns a Promise (async validation is not supported).
 * - If validation fails (first reported issue).
 */

/**
 * Public Overload:
 * The output type is inferred from the schema. Keeping the implementation
 * signature separate avoids asserting `unknown` results to the inferred type.
 */
export function validateWithSchema<S extends StandardSchemaV1>(
  schema: S,
  input: unknown,
  label: string
): StandardSchemaV1.InferOutput<S>;

export function validateWithSchema(
  schema: StandardSchemaV1,
  input: unknown,
  label: string
): unknown {
  // Guards against plain objects or malformed configurations being treated as schemas.
  if (!('~standard' in schema)) {
    throw new Error(
      `[coercible] The schema for "${label}" is invalid. Expected an object with the "~standard" property.`
    );
  }

  const result = schema['~standard'].validate(input);

  if (result instanceof Promise) {
    throw new Error(
      `[coercible] Async schema validation is not supported for "${label}".`
    );
  }

  const [firstIssue] = result.issues ?? [];
  if (firstIssue) {
    throw new Error(`[coercible] Invalid "${label}": ${firstIssue.message}`);
  }

  if ('value' in result) {
    return result.value;
  }

  return input;
}
