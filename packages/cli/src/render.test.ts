import { describe, expect, it } from 'vitest';
import { ErrorCode, type CLIErrorView } from '@randomjson/core';
import { renderCLIView, stripAnsi } from './render.js';

describe('renderCLIView', () => {
  it('renders title and sections in order', () => {
    const view: CLIErrorView = {
      title: 'UnboundVariableError E100: Variable "x" is not defined',
      code: ErrorCode.UNBOUND_VARIABLE,
      exitCode: 20,
      location: 'Location: /schema/a',
      marker: '{{variable|x}}',
      workaround: 'Did you mean "y"?',
      colors: false,
      terminalWidth: 80,
    };

    expect(renderCLIView(view).split('\n')).toEqual([
      '❌ UnboundVariableError E100: Variable "x" is not defined',
      '📍 Location: /schema/a',
      'Marker: {{variable|x}}',
      '💡 Did you mean "y"?',
    ]);
  });

  it('lists details one per line', () => {
    const view: CLIErrorView = {
      title: 'DocumentValidationError E200: Invalid input document',
      code: ErrorCode.DOCUMENT_VALIDATION_FAILED,
      exitCode: 30,
      details: ['/ must have required property \'schema\'', '/variables must be object'],
      colors: false,
      terminalWidth: 80,
    };

    expect(renderCLIView(view).split('\n').slice(1)).toEqual([
      "  - / must have required property 'schema'",
      '  - /variables must be object',
    ]);
  });

  it('wraps long sections to the terminal width', () => {
    const view: CLIErrorView = {
      title: 'ConfigError E300: bad',
      code: ErrorCode.CONFIGURATION_ERROR,
      exitCode: 40,
      excerpt: 'aaaa bbbb cccc dddd',
      colors: false,
      terminalWidth: 14,
    };

    expect(renderCLIView(view).split('\n').slice(1)).toEqual([
      'Excerpt: aaaa',
      'bbbb cccc dddd',
    ]);
  });

  it('applies ANSI colors when enabled', () => {
    const view: CLIErrorView = {
      title: 'InternalError E500: boom',
      code: ErrorCode.INTERNAL_ERROR,
      exitCode: 99,
      colors: true,
      terminalWidth: 80,
    };

    const out = renderCLIView(view);
    expect(out.includes('\u001B[31m')).toBe(true);
    expect(stripAnsi(out)).toBe('❌ InternalError E500: boom');
  });
});
