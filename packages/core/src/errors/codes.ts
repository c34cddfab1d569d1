/**
 * Error Code Infrastructure
 * Stable error codes and exit codes.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Template Errors (E001–E099)
  MARKER_SYNTAX = 'E001',
  UNKNOWN_DIRECTIVE_KIND = 'E002',

  // Evaluation Errors (E100–E199)
  UNBOUND_VARIABLE = 'E100',
  FUNCTION_NOT_FOUND = 'E101',
  ARGUMENT_ARITY = 'E102',
  TYPE_COERCION = 'E103',
  INVALID_REPEAT_COUNT = 'E104',
  FUNCTION_CALL_FAILED = 'E105',

  // Input Document Errors (E200–E299)
  DOCUMENT_VALIDATION_FAILED = 'E200',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Parse Errors (E400–E499)
  PARSE_ERROR = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.MARKER_SYNTAX]: 10,
  [ErrorCode.UNKNOWN_DIRECTIVE_KIND]: 11,
  [ErrorCode.UNBOUND_VARIABLE]: 20,
  [ErrorCode.FUNCTION_NOT_FOUND]: 21,
  [ErrorCode.ARGUMENT_ARITY]: 22,
  [ErrorCode.TYPE_COERCION]: 23,
  [ErrorCode.INVALID_REPEAT_COUNT]: 24,
  [ErrorCode.FUNCTION_CALL_FAILED]: 25,
  [ErrorCode.DOCUMENT_VALIDATION_FAILED]: 30,
  [ErrorCode.CONFIGURATION_ERROR]: 40,
  [ErrorCode.PARSE_ERROR]: 50,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
