import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { Command } from 'commander';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

// Commander keeps parsed option values on the program, so every test loads
// a fresh copy of the module.
async function loadProgram(): Promise<Command> {
  vi.resetModules();
  const mod = await import('./index.js');
  return mod.program;
}

interface CliRun {
  stdout: string;
  stderr: string;
  consoleErrors: string[];
  exitCode?: number;
}

async function runCli(args: string[]): Promise<CliRun> {
  const program = await loadProgram();
  const stdoutChunks: string[] = [];
  const stderrChunks: string[] = [];
  const consoleErrors: string[] = [];
  let exitCode: number | undefined;

  const stdoutSpy = vi
    .spyOn(process.stdout, 'write')
    .mockImplementation((chunk: unknown) => {
      stdoutChunks.push(String(chunk));
      return true;
    });
  const stderrSpy = vi
    .spyOn(process.stderr, 'write')
    .mockImplementation((chunk: unknown) => {
      stderrChunks.push(String(chunk));
      return true;
    });
  const consoleSpy = vi
    .spyOn(console, 'error')
    .mockImplementation((...parts: unknown[]) => {
      consoleErrors.push(parts.map(String).join(' '));
    });
  const exitSpy = vi
    .spyOn(process, 'exit')
    .mockImplementation((code?: string | number | null) => {
      exitCode = Number(code);
      throw new Error(`process.exit(${String(code)})`);
    });

  try {
    await program.parseAsync(args, { from: 'user' });
  } catch (error) {
    if (exitCode === undefined) throw error;
  } finally {
    stdoutSpy.mockRestore();
    stderrSpy.mockRestore();
    consoleSpy.mockRestore();
    exitSpy.mockRestore();
  }

  return {
    stdout: stdoutChunks.join(''),
    stderr: stderrChunks.join(''),
    consoleErrors,
    exitCode,
  };
}

describe('randomjson CLI', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'randomjson-cli-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('prints the resolved document for literal JSON input', async () => {
    const input = JSON.stringify({
      schema: { a: '{{const|5|int}}', b: '{{variable|x}}', c: [1, 'two'] },
      variables: { x: 'y' },
    });

    const run = await runCli([input]);

    expect(run.exitCode).toBeUndefined();
    expect(run.stdout).toBe('{"a":5,"b":"y","c":[1,"two"]}\n');
    expect(run.stderr).toBe('');
  });

  it('reproduces the same output for the same --seed', async () => {
    const input = JSON.stringify({
      schema: { id: '{{function|uuid}}', n: ['{{function|rand}}', 1, 1000] },
    });

    const first = await runCli(['--seed', '7', input]);
    const second = await runCli(['--seed', '7', input]);

    expect(first.stdout).not.toBe('');
    expect(second.stdout).toBe(first.stdout);
  });

  it('reads the input document from @file', async () => {
    const file = path.join(dir, 'input.json');
    await writeFile(
      file,
      JSON.stringify({ schema: ['{{repeat}}', 3, '{{const|x}}'] }),
      'utf8'
    );

    const run = await runCli([`@${file}`]);

    expect(run.stdout).toBe('["x","x","x"]\n');
  });

  it('prints the compiled template with -E', async () => {
    const input = JSON.stringify({
      schema: { n: '{{const|3|int}}', v: '{{variable|unset}}' },
    });

    const run = await runCli(['-E', input]);

    expect(run.exitCode).toBeUndefined();
    expect(JSON.parse(run.stdout)).toEqual({
      n: { type: 'const', value: 3 },
      v: { type: 'variable', name: 'unset' },
    });
  });

  it('indents output with --pretty', async () => {
    const run = await runCli(['--pretty', '{"schema":{"a":[1]}}']);

    expect(run.stdout).toBe('{\n  "a": [\n    1\n  ]\n}\n');
  });

  it('prints metrics to stderr with --print-metrics', async () => {
    const run = await runCli([
      '--print-metrics',
      '{"schema":{"a":"{{const|1|int}}"}}',
    ]);

    expect(run.stdout).toBe('{"a":1}\n');
    expect(run.stderr.endsWith('\n')).toBe(true);
    const metrics: unknown = JSON.parse(run.stderr);
    expect(metrics).toMatchObject({ functionCalls: 0, repeatItems: 0 });
  });

  it('exits with 20 and names the location of an unbound variable', async () => {
    const run = await runCli(['{"schema":{"a":"{{variable|missing}}"}}']);

    expect(run.exitCode).toBe(20);
    expect(run.stdout).toBe('');
    const output = run.consoleErrors.join('\n');
    expect(output).toContain(
      'UnboundVariableError E100: Variable "missing" is not defined'
    );
    expect(output).toContain('Location: /schema/a');
  });

  it('exits with 50 on invalid JSON input', async () => {
    const run = await runCli(['{"schema": ']);

    expect(run.exitCode).toBe(50);
    expect(run.consoleErrors.join('\n')).toContain('ParseError E400');
  });

  it('exits with 40 on an invalid --max-repeat value', async () => {
    const run = await runCli(['--max-repeat', 'abc', '{"schema":1}']);

    expect(run.exitCode).toBe(40);
    expect(run.consoleErrors.join('\n')).toContain(
      'Invalid --max-repeat: "abc" (expected a non-negative integer)'
    );
  });

  it('exits with 40 when the input file is missing', async () => {
    const missing = path.join(dir, 'missing.json');

    const run = await runCli([`@${missing}`]);

    expect(run.exitCode).toBe(40);
    expect(run.consoleErrors.join('\n')).toContain(
      `Cannot read input file ${missing}`
    );
  });

  it('enforces --max-repeat during generation', async () => {
    const run = await runCli([
      '--max-repeat',
      '2',
      '{"schema":["{{repeat}}",3,1]}',
    ]);

    expect(run.exitCode).toBe(24);
  });
});
