/**
 * Directive Parser
 *
 * Marker grammar: `{{kind}}` or `{{kind|arg1|...|argN}}`. The kind tag is
 * trimmed; const values are kept exactly as written.
 *
 *   {{variable|name}}        variable reference
 *   {{function|name}}        function call (operands follow in the array)
 *   {{const|value}}          string literal
 *   {{const|value|type}}     literal coerced to int|float|str|bool|list|dict
 *   {{cond}}, {{repeat}}     array constructs (operands follow in the array)
 */

import {
  MarkerSyntaxError,
  TypeCoercionError,
  UnknownDirectiveKindError,
} from '../types/errors.js';
import { isErr } from '../types/result.js';
import {
  isConstType,
  isDirectiveKind,
  type ConstDirective,
  type Directive,
} from '../types/template.js';
import { coerceLiteral } from './coerce.js';

export const MARKER_OPEN = '{{';
export const MARKER_CLOSE = '}}';
const SEGMENT_SEPARATOR = '|';

/** True when the string is meant as a marker (starts with the open delimiter). */
export function isMarker(text: string): boolean {
  return text.startsWith(MARKER_OPEN);
}

/**
 * Parse a string leaf.
 * @returns the directive, or undefined for a plain literal string
 * @throws MarkerSyntaxError, UnknownDirectiveKindError, TypeCoercionError
 */
export function parseMarker(text: string): Directive | undefined {
  if (!isMarker(text)) {
    return undefined;
  }
  if (!text.endsWith(MARKER_CLOSE)) {
    throw syntaxError(text, `Marker is missing its closing "${MARKER_CLOSE}"`);
  }

  const inner = text.slice(MARKER_OPEN.length, -MARKER_CLOSE.length);
  if (inner.includes(MARKER_OPEN) || inner.includes(MARKER_CLOSE)) {
    throw syntaxError(text, 'Markers cannot be nested or repeated');
  }

  const [head = '', ...args] = inner.split(SEGMENT_SEPARATOR);
  const kind = head.trim();
  if (kind === '') {
    throw syntaxError(text, 'Marker has an empty kind');
  }
  if (!isDirectiveKind(kind)) {
    throw new UnknownDirectiveKindError({ kind, marker: text });
  }

  switch (kind) {
    case 'variable':
    case 'function':
      return { kind, name: parseName(text, kind, args), raw: text };
    case 'const':
      return parseConst(text, args);
    case 'cond':
    case 'repeat':
      if (args.length > 0) {
        throw syntaxError(text, `"${kind}" markers take no arguments`);
      }
      return { kind, raw: text };
  }
}

function parseName(marker: string, kind: string, args: string[]): string {
  const name = args.length === 1 ? (args[0] ?? '').trim() : '';
  if (name === '') {
    throw syntaxError(marker, `"${kind}" markers take exactly one name`);
  }
  return name;
}

function parseConst(marker: string, args: string[]): ConstDirective {
  if (args.length === 0 || args.length > 2) {
    throw syntaxError(
      marker,
      '"const" markers take a value and an optional type'
    );
  }
  const [raw = '', typeText] = args;
  if (typeText === undefined) {
    return { kind: 'const', value: raw, type: 'str', raw: marker };
  }

  const type = typeText.trim();
  if (!isConstType(type)) {
    throw new TypeCoercionError({
      message: `Unknown const type "${type}" in ${marker}`,
      targetType: type,
      value: raw,
    });
  }
  const coerced = coerceLiteral(raw, type);
  if (isErr(coerced)) {
    coerced.error.context.marker = marker;
    throw coerced.error;
  }
  return { kind: 'const', value: coerced.value, type, raw: marker };
}

function syntaxError(marker: string, message: string): MarkerSyntaxError {
  return new MarkerSyntaxError({ message: `${message}: ${marker}`, marker });
}
