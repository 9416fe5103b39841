import { describe, test, expect, beforeEach, afterEach } from 'vitest';

import { ErrorPresenter } from '../presenter.js';
import { ErrorCode } from '../codes.js';
import {
  BenchmarkNotFoundError,
  IncompatibilityError,
  PersistenceError,
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

  test('formats the title from code and message', () => {
    const presenter = new ErrorPresenter('dev', { colors: false, terminalWidth: 60 });
    const view = presenter.formatForCLI(new BenchmarkNotFoundError('telco'));
    expect(view).toEqual({
      title: 'Error E400: Benchmark not found: "telco"',
      code: ErrorCode.BENCHMARK_NOT_FOUND,
      location: 'Benchmark: telco',
      detail: undefined,
      cause: undefined,
      colors: false,
      terminalWidth: 60,
    });
  });

  test('shows expected and actual metadata values', () => {
    const presenter = new ErrorPresenter('dev', { colors: false });
    const error = new IncompatibilityError('Incompatible run', {
      context: { benchmark: 'bench', key: 'hostname', value: 'host2', expected: 'host1' },
    });
    expect(presenter.formatForCLI(error).detail).toBe(
      'hostname: expected "host1", got "host2"'
    );
  });

  test('prefers the file path as location and reports the cause', () => {
    const presenter = new ErrorPresenter('dev', { colors: false });
    const error = new PersistenceError('Unable to read results.json', {
      path: 'results.json',
      cause: new Error('permission denied'),
    });
    const view = presenter.formatForCLI(error);
    expect(view.location).toBe('File: results.json');
    expect(view.cause).toBe('permission denied');
  });

  test('NO_COLOR disables colors and FORCE_COLOR enables them', () => {
    const error = new BenchmarkNotFoundError('x');
    process.env.NO_COLOR = '1';
    expect(new ErrorPresenter('dev', { colors: true }).formatForCLI(error).colors).toBe(
      false
    );
    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '1';
    expect(new ErrorPresenter('prod', { colors: false }).formatForCLI(error).colors).toBe(
      true
    );
    process.env.FORCE_COLOR = '';
    expect(new ErrorPresenter('dev').formatForCLI(error).colors).toBe(true);
    expect(new ErrorPresenter('prod').formatForCLI(error).colors).toBe(false);
  });

  test('production view drops the stack and the offending value', () => {
    const error = new IncompatibilityError('Incompatible run', {
      context: { benchmark: 'bench', key: 'hostname', value: 'host2' },
    });
    const view = new ErrorPresenter('prod').formatForProduction(error);
    expect(view.stack).toBeUndefined();
    expect(view.context).toEqual({ benchmark: 'bench', key: 'hostname' });
    expect(view.errorCode).toBe(ErrorCode.INCOMPATIBLE_RUN);
  });
});
