/**
 * ErrorPresenter - pure presentation layer for RandomJsonError instances
 * - No business logic; formats errors into the CLI view
 */

import type { ErrorCode } from './codes.js';
import type { ErrorContext, RandomJsonError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  exitCode: number;
  location?: string;
  path?: string;
  marker?: string;
  excerpt?: string;
  workaround?: string;
  details?: string[];
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: RandomJsonError): CLIErrorView {
    const context = error.context;
    const marker = stringField(context, 'marker');
    const excerpt = stringField(context, 'valueExcerpt');
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      exitCode: error.getExitCode(),
      location: this.#formatLocation(context),
      path: stringField(context, 'path'),
      marker,
      excerpt: excerpt === marker ? undefined : excerpt,
      workaround: stringField(context, 'suggestion'),
      details: this.#formatDetails(context),
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  // Helpers
  #formatTitle(error: RandomJsonError): string {
    return `${error.name} ${error.errorCode}: ${error.message}`;
  }

  #formatLocation(ctx: ErrorContext): string | undefined {
    const path = stringField(ctx, 'path');
    if (path === undefined) return undefined;
    return `Location: ${path === '' ? '/' : path}`;
  }

  // Document validation lists every failure, one line each
  #formatDetails(ctx: ErrorContext): string[] | undefined {
    const failures = ctx['failures'];
    if (!Array.isArray(failures) || failures.length < 2) return undefined;
    return failures.flatMap((failure: unknown) => {
      if (typeof failure !== 'object' || failure === null) return [];
      const path = 'path' in failure ? failure.path : undefined;
      const message = 'message' in failure ? failure.message : undefined;
      return typeof message === 'string'
        ? [`${typeof path === 'string' && path !== '' ? path : '/'} ${message}`]
        : [];
    });
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }

  #getTerminalWidth(opt?: number): number {
    return opt || process.stdout?.columns || 80;
  }
}

function stringField(ctx: ErrorContext, key: string): string | undefined {
  const value = ctx[key];
  return typeof value === 'string' ? value : undefined;
}

export default ErrorPresenter;
