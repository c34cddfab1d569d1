import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { ConfigError } from '@randomjson/core';

export const STDIN_ARGUMENT = '@-';
const FILE_PREFIX = '@';

export interface InputSources {
  readFile(file: string): Promise<string>;
  readStdin(): Promise<string>;
}

async function readStream(
  stream: AsyncIterable<string | Buffer>
): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

export const defaultSources: InputSources = {
  readFile: (file) => readFile(file, 'utf8'),
  readStdin: () => readStream(process.stdin),
};

/**
 * Resolve the `<random_json>` argument: literal JSON text, `@path` for a
 * file, or `@-` for standard input.
 *
 * @throws ConfigError when the file or stream cannot be read
 */
export async function readRandomJsonArgument(
  argument: string,
  sources: InputSources = defaultSources
): Promise<string> {
  if (argument === STDIN_ARGUMENT) {
    return sources.readStdin();
  }
  if (!argument.startsWith(FILE_PREFIX)) {
    return argument;
  }

  const file = path.resolve(process.cwd(), argument.slice(FILE_PREFIX.length));
  try {
    return await sources.readFile(file);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError({
      message: `Cannot read input file ${file}: ${reason}`,
      setting: 'random_json',
      value: argument,
    });
  }
}
