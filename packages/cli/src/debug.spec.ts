import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigError, type GenerateResult } from '@randomjson/core';
import {
  LOG_PREFIX,
  logLine,
  printErrorDebug,
  printMetrics,
  printRunDebug,
} from './debug.js';

describe('debug output', () => {
  let chunks: string[] = [];

  beforeEach(() => {
    chunks = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: unknown) => {
      chunks.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const result: GenerateResult = {
    value: { a: 1 },
    seed: 5,
    metrics: {
      compileMs: 1.234,
      evaluateMs: 0.5,
      nodesEvaluated: 2,
      functionCalls: 0,
      repeatItems: 0,
      condOmitted: 0,
    },
  };

  it('prefixes every line', () => {
    logLine('hello');
    expect(chunks).toEqual([`${LOG_PREFIX} hello\n`]);
  });

  it('prints options, seed and timings', () => {
    printRunDebug({ seed: 5 }, result);
    expect(chunks).toEqual([
      '[randomjson] options: {"seed":5}\n',
      '[randomjson] seed: 5\n',
      '[randomjson] timings: compile=1.23ms evaluate=0.50ms\n',
    ]);
  });

  it('skips timings without metrics', () => {
    printRunDebug({}, { value: null, seed: 1 });
    expect(chunks).toEqual([
      '[randomjson] options: {}\n',
      '[randomjson] seed: 1\n',
    ]);
  });

  it('prints metrics as one bare JSON line', () => {
    printMetrics(result);
    expect(chunks).toEqual([
      '{"compileMs":1.234,"evaluateMs":0.5,"nodesEvaluated":2,"functionCalls":0,"repeatItems":0,"condOmitted":0}\n',
    ]);
  });

  it('prints the serialized error', () => {
    printErrorDebug(
      new ConfigError({ message: 'bad', setting: '--seed' }),
      'dev'
    );
    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toContain('[randomjson] error: {');
    expect(chunks[0]).toContain('"name": "ConfigError"');
  });
});
