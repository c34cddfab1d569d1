import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { ErrorCode } from '../codes.js';
import { ErrorPresenter } from '../presenter.js';
import {
  ConfigError,
  createValidationFailure,
  DocumentValidationError,
  MarkerSyntaxError,
  TypeCoercionError,
} from '../../types/errors.js';

describe('ErrorPresenter', () => {
  const origEnv = { ...process.env };

  beforeEach(() => {
    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '';
  });

  afterEach(() => {
    process.env = { ...origEnv };
  });

  test('formatForCLI builds title, location and marker', () => {
    const err = new MarkerSyntaxError({
      message: 'Marker is missing its closing "}}": {{const|x',
      marker: '{{const|x',
      path: '/schema/a',
    });
    const view = new ErrorPresenter('dev', {
      colors: false,
      terminalWidth: 100,
    }).formatForCLI(err);

    expect(view.title).toBe(
      'MarkerSyntaxError E001: Marker is missing its closing "}}": {{const|x'
    );
    expect(view.code).toBe(ErrorCode.MARKER_SYNTAX);
    expect(view.exitCode).toBe(10);
    expect(view.location).toBe('Location: /schema/a');
    expect(view.path).toBe('/schema/a');
    expect(view.marker).toBe('{{const|x');
    // The excerpt repeats the marker, so it is dropped
    expect(view.excerpt).toBeUndefined();
    expect(view.details).toBeUndefined();
    expect(view.colors).toBe(false);
    expect(view.terminalWidth).toBe(100);
  });

  test('the root pointer is shown as /', () => {
    const err = new TypeCoercionError({
      message: 'Cannot convert "x" to int',
      targetType: 'int',
      value: 'x',
      path: '',
    });
    const view = new ErrorPresenter('dev').formatForCLI(err);
    expect(view.location).toBe('Location: /');
    expect(view.excerpt).toBe('x');
  });

  test('document validation lists every failure', () => {
    const err = new DocumentValidationError({
      message: 'Invalid input document',
      failures: [
        createValidationFailure('', 'must have required property \'schema\'', 'required', '#/required'),
        createValidationFailure('/variables/a', 'must be string', 'type', '#/properties/variables'),
      ],
    });
    const view = new ErrorPresenter('dev', { colors: false }).formatForCLI(err);
    expect(view.details).toEqual([
      "/ must have required property 'schema'",
      '/variables/a must be string',
    ]);
    expect(view.workaround).toBe("/ must have required property 'schema'");
  });

  test('NO_COLOR wins over an explicit colors option, FORCE_COLOR enables', () => {
    const err = new ConfigError({ message: 'bad', setting: 'seed' });
    process.env.NO_COLOR = '1';
    expect(
      new ErrorPresenter('dev', { colors: true }).formatForCLI(err).colors
    ).toBe(false);
    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '1';
    expect(
      new ErrorPresenter('prod', { colors: false }).formatForCLI(err).colors
    ).toBe(true);
    process.env.FORCE_COLOR = '';
    expect(new ErrorPresenter('dev').formatForCLI(err).colors).toBe(true);
    expect(new ErrorPresenter('prod').formatForCLI(err).colors).toBe(false);
  });
});
