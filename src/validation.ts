/**
 * Validation utilities using TypeBox.
 *
 * Only the request envelope is validated structurally; endpoint arguments
 * are checked by the typed accessors on `RequestArgs`.
 */

import type { TSchema } from 'typebox';
import { Compile } from 'typebox/compile';
import { ValidationError } from './errors.ts';
import type { IncomingRequestFrame, RequestFrame } from './wire.ts';

/**
 * JSON Schema definition (subset relevant for envelope validation).
 */
export interface JSONSchema {
  type?: string | string[];
  properties?: Record<string, JSONSchema>;
  additionalProperties?: boolean | JSONSchema;
  items?: JSONSchema;
  required?: string[];
}

/**
 * Compiled validator for a schema.
 */
export interface CompiledValidator<T> {
  /** Check if value is valid */
  check: (value: unknown) => value is T;
  /** Validate and throw on error */
  validate: (value: unknown) => T;
}

/**
 * TypeBox localized validation error type.
 */
interface LocalizedValidationError {
  instancePath: string;
  message: string;
}

/**
 * Format validation errors for display.
 */
function formatErrors(errors: LocalizedValidationError[]): string {
  if (errors.length === 0) {
    return 'Unknown validation error';
  }
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message}`).join('; ');
}

/**
 * Compile a JSON Schema into a validator.
 */
export function compileSchema<T>(schema: JSONSchema): CompiledValidator<T> {
  // TypeBox can work with plain JSON Schema objects
  const tbSchema = schema as TSchema;
  const compiled = Compile(tbSchema);

  const check = (value: unknown): value is T => compiled.Check(value);

  return {
    check,
    validate: (value: unknown): T => {
      if (!check(value)) {
        throw new ValidationError(formatErrors(compiled.Errors(value)));
      }
      return value;
    },
  };
}

const requestEnvelope = compileSchema<IncomingRequestFrame>({
  type: 'object',
  required: ['id'],
  properties: {
    path: { type: 'string' },
    method: { type: 'string' },
    args: { type: 'object' },
    params: { type: 'object' },
  },
});

/**
 * Validate a decoded frame as a request envelope and normalize its aliases.
 *
 * @throws ValidationError if the envelope is malformed
 */
export function parseRequestFrame(value: unknown): RequestFrame {
  const frame = requestEnvelope.validate(value);

  const path = frame.path ?? frame.method;
  if (path === undefined) {
    throw new ValidationError('/: Request requires a "path" or "method" property');
  }

  return {
    id: frame.id,
    path,
    args: frame.args ?? frame.params ?? {},
  };
}
