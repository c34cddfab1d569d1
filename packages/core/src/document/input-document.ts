/**
 * Input document loader
 *
 * An input document is `{ "schema": <template>, "variables"?: {...} }`.
 * Its shape is checked with AJV (all errors reported); the template itself
 * is any JSON value and is checked later by the compiler.
 */

import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';

import {
  createValidationFailure,
  DocumentValidationError,
  ParseError,
  type ValidationFailure,
} from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { isValue, type JsonValue, type Scalar } from '../types/value.js';

export interface InputDocument {
  schema: JsonValue;
  variables: Record<string, Scalar | Scalar[]>;
}

interface RawInputDocument {
  schema: unknown;
  variables?: Record<string, Scalar | Scalar[]>;
}

const SCALAR_TYPES = ['string', 'number', 'boolean', 'null'];

export const INPUT_DOCUMENT_SCHEMA = {
  type: 'object',
  required: ['schema'],
  additionalProperties: false,
  properties: {
    schema: {},
    variables: {
      type: 'object',
      additionalProperties: {
        anyOf: [
          { type: SCALAR_TYPES },
          { type: 'array', items: { type: SCALAR_TYPES } },
        ],
      },
    },
  },
} as const;

let validator: ValidateFunction<RawInputDocument> | undefined;

function getValidator(): ValidateFunction<RawInputDocument> {
  validator ??= new Ajv({
    allErrors: true,
    allowUnionTypes: true,
  }).compile<RawInputDocument>(INPUT_DOCUMENT_SCHEMA);
  return validator;
}

/**
 * Parse and validate input document text.
 */
export function parseInputDocument(
  text: string
): Result<InputDocument, ParseError | DocumentValidationError> {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    return err(
      new ParseError({
        message: `Input is not valid JSON: ${cause?.message ?? String(error)}`,
        input: text,
        position: positionOf(cause),
        cause,
      })
    );
  }
  return validateInputDocument(data);
}

/**
 * Check an already-parsed value against the input document shape.
 */
export function validateInputDocument(
  data: unknown
): Result<InputDocument, DocumentValidationError> {
  const validate = getValidator();
  if (!validate(data)) {
    const failures = (validate.errors ?? []).map(toFailure);
    return err(
      new DocumentValidationError({
        message: `Invalid input document: ${failures
          .map((f) => `${f.path || '/'} ${f.message}`)
          .join('; ')}`,
        failures,
      })
    );
  }
  const { schema, variables = {} } = data;
  if (!isValue(schema)) {
    return err(
      new DocumentValidationError({
        message: 'Invalid input document: /schema is not JSON data',
        failures: [
          createValidationFailure(
            '/schema',
            'is not JSON data',
            'type',
            '#/properties/schema'
          ),
        ],
      })
    );
  }
  return ok({ schema, variables });
}

function toFailure(error: ErrorObject): ValidationFailure {
  const extra = error.params['additionalProperty'];
  const message =
    error.keyword === 'additionalProperties' && typeof extra === 'string'
      ? `${error.message ?? 'is invalid'}: "${extra}"`
      : (error.message ?? 'is invalid');
  return createValidationFailure(
    error.instancePath,
    message,
    error.keyword,
    error.schemaPath,
    error.params
  );
}

function positionOf(error: Error | undefined): number | undefined {
  const match = error?.message.match(/at position (\d+)/);
  return match?.[1] === undefined ? undefined : Number(match[1]);
}
