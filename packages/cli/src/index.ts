#!/usr/bin/env node

// CLI entry point
// - `randomjson [options] <random_json>` reads an input document
//   ({ "schema": ..., "variables": ... }) given as JSON text, @file or @-,
//   and prints the generated document as JSON on stdout.
// - `-E/--only-preprocessor` prints the compiled template view instead.
// - Failures are rendered through ErrorPresenter and exit with the code
//   mapped from the error code.

import { Command, Option } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  builtinRegistry,
  describeArity,
  ErrorPresenter,
  generate,
  InternalError,
  isRandomJsonError,
  parseInputDocument,
  preprocess,
  type RandomJsonError,
  type Value,
} from '@randomjson/core';
import { renderCLIView } from './render.js';
import {
  ENV_SEED,
  ENV_VERBOSE,
  parseGenerateOptions,
  resolveIndent,
  type CliOptions,
} from './flags.js';
import { readRandomJsonArgument } from './input.js';
import {
  logLine,
  printErrorDebug,
  printMetrics,
  printRunDebug,
} from './debug.js';

const DIRECTIVES_HELP = `
Directives (string leaves of "schema"):
  "{{variable|name}}"                      value of variables.name
  "{{const|value}}", "{{const|value|type}}" literal; type is int, float, str, bool, list or dict
  "{{function|name}}"                      call with no arguments
  ["{{function|name}}", arg, ...]          call; arguments are resolved first
  ["{{repeat}}", count, template]          list of count independent copies of template
  ["{{cond}}", [[test, value], ...]]       value of the first truthy test; omitted if none
`;

function functionsHelp(): string {
  const lines = builtinRegistry
    .definitions()
    .map((fn) => {
      const arity = `(${describeArity(fn.arity)})`;
      return `  ${fn.name.padEnd(8)} ${arity.padEnd(14)} ${fn.description}`;
    });
  return `\nFunctions:\n${lines.join('\n')}\n`;
}

const program = new Command();

program
  .name('randomjson')
  .description('Generate randomized JSON from a template document')
  .version('0.1.0')
  .argument(
    '<random_json>',
    'input document: JSON text, @file, or @- to read standard input'
  )
  .option(
    '-E, --only-preprocessor',
    'print the compiled template instead of generating'
  )
  .addOption(
    new Option(
      '--seed <value>',
      'random seed: an integer or any string (hashed)'
    ).env(ENV_SEED)
  )
  .option(
    '--max-repeat <n>',
    'largest count of a single repeat (default: 10000)'
  )
  .option(
    '--max-items <n>',
    'total items all repeats may produce (default: 1000000)'
  )
  .option('--pretty', 'indent output by two spaces')
  .option('--print-metrics', 'print run metrics as JSON to stderr')
  .addOption(
    new Option('-v, --verbose', 'print diagnostics to stderr').env(ENV_VERBOSE)
  )
  .addHelpText('after', () => DIRECTIVES_HELP + functionsHelp())
  .action(async (randomJson: string, options: CliOptions) => {
    try {
      const text = await readRandomJsonArgument(randomJson);

      if (options.onlyPreprocessor) {
        const document = parseInputDocument(text).unwrap();
        writeJson(
          preprocess(document.schema, { basePointer: '/schema' }),
          options
        );
        return;
      }

      const generateOptions = parseGenerateOptions(options);
      const result = generate(text, generateOptions);
      writeJson(result.value, options);

      if (options.verbose) {
        printRunDebug(generateOptions, result);
      }
      if (options.printMetrics) {
        printMetrics(result);
      }
    } catch (err: unknown) {
      await handleCliError(err, options.verbose === true);
    }
  });

function writeJson(value: Value, options: CliOptions): void {
  process.stdout.write(
    `${JSON.stringify(value, null, resolveIndent(options))}\n`
  );
}

function toRandomJsonError(err: unknown): RandomJsonError {
  if (isRandomJsonError(err)) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new InternalError({
    message: message || 'Unexpected error',
    cause: err instanceof Error ? err : undefined,
  });
}

async function handleCliError(
  err: unknown,
  verbose = false
): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, {
    colors: process.stderr.isTTY === true,
  });
  const error = toRandomJsonError(err);

  console.error(renderCLIView(presenter.formatForCLI(error)));
  if (verbose) {
    printErrorDebug(error, env);
    logLine(`exit code: ${error.getExitCode()}`);
  }

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
