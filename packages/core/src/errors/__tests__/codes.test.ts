import { describe, expect, test } from 'vitest';

import { ErrorCode, EXIT_CODES, getExitCode } from '../codes.js';

describe('Error Code Infrastructure', () => {
  test('all error codes are unique', () => {
    const codes = Object.values(ErrorCode);
    expect(new Set(codes).size).toBe(codes.length);
  });

  test('EXIT_CODES covers every ErrorCode', () => {
    const enumCodes = Object.values(ErrorCode);
    expect(Object.keys(EXIT_CODES)).toHaveLength(enumCodes.length);
    for (const code of enumCodes) {
      expect(EXIT_CODES[code]).toBeTypeOf('number');
    }
  });

  test('exit codes are unique and within 1-255', () => {
    const exits = Object.values(EXIT_CODES);
    expect(new Set(exits).size).toBe(exits.length);
    for (const exit of exits) {
      expect(exit).toBeGreaterThanOrEqual(1);
      expect(exit).toBeLessThanOrEqual(255);
    }
  });

  test('getExitCode maps template, evaluation and internal errors', () => {
    expect(getExitCode(ErrorCode.MARKER_SYNTAX)).toBe(10);
    expect(getExitCode(ErrorCode.UNBOUND_VARIABLE)).toBe(20);
    expect(getExitCode(ErrorCode.INVALID_REPEAT_COUNT)).toBe(24);
    expect(getExitCode(ErrorCode.PARSE_ERROR)).toBe(50);
    expect(getExitCode(ErrorCode.INTERNAL_ERROR)).toBe(99);
  });
});
