import { ConfigurationError } from '@valuescope/shared';
import chalk from 'chalk';
import { afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import {
  ANALYSIS_TIPS,
  CLIError,
  CLIValidationError,
  displayTroubleshootingTips,
  EXIT_CODES,
  handleCommandError,
  tipsForErrorType,
} from './error-handling.js';

function createSpinner() {
  return {
    fail: vi.fn(),
    stop: vi.fn(),
  };
}

function captureThrown(run: () => void): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('error-handling utilities', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('provides structured CLI error classes', () => {
    const base = new CLIError('base');
    expect(base.name).toBe('CLIError');
    expect(base.exitCode).toBe(1);
    expect(base.silent).toBe(false);

    const validation = new CLIValidationError('invalid input');
    expect(validation.name).toBe('CLIValidationError');
    expect(validation.exitCode).toBe(EXIT_CODES.USAGE);
    expect(validation.exitCode).toBe(2);
    expect(validation.silent).toBe(false);
  });

  it('prints troubleshooting tips in consistent format', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    displayTroubleshootingTips(['Tip A', 'Tip B']);

    const lines = errorSpy.mock.calls.map((call) => String(call[0] ?? ''));
    expect(lines).toEqual(['\n💡 Troubleshooting tips:', '   • Tip A', '   • Tip B']);
  });

  it('puts the tip for the failure category first', () => {
    expect(tipsForErrorType('NOT_FOUND_ERROR', ['General tip'])).toEqual([
      'No snapshot was found for the ticker at the selected source',
      'General tip',
    ]);
    expect(tipsForErrorType('UNKNOWN_ERROR', ['General tip'])).toEqual(['General tip']);
  });

  it('rethrows existing CLIError without wrapping', () => {
    const spinner = createSpinner();
    const original = new CLIValidationError('invalid');

    const thrown = captureThrown(() => handleCommandError(original, spinner, { failMessage: 'should not be used' }));

    expect(thrown).toBe(original);
    expect(spinner.stop).toHaveBeenCalledTimes(1);
    expect(spinner.fail).not.toHaveBeenCalled();
  });

  it('wraps other errors in a silent CLIError after reporting them', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const spinner = createSpinner();
    const cause = new ConfigurationError('bad rate');

    const thrown = captureThrown(() =>
      handleCommandError(cause, spinner, { failMessage: 'Metrics analysis failed', tips: ['Check the rates'] })
    );

    expect(spinner.fail).toHaveBeenCalledWith('Metrics analysis failed');
    expect(thrown).toBeInstanceOf(CLIError);
    expect(thrown instanceof CLIError && thrown.silent).toBe(true);
    expect(thrown instanceof CLIError && thrown.cause).toBe(cause);

    const lines = errorSpy.mock.calls.map((call) => String(call[0] ?? ''));
    expect(lines[0]).toBe('\nError [INVALID_CONFIGURATION]: bad rate');
    expect(lines).toContain('   • Check the rates');
  });

  it('falls back to the metrics tips', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    captureThrown(() => handleCommandError(new Error('boom'), createSpinner(), { failMessage: 'failed' }));

    const lines = errorSpy.mock.calls.map((call) => String(call[0] ?? ''));
    expect(lines[0]).toBe('\nError: boom');
    expect(lines.slice(-ANALYSIS_TIPS.metrics.length)).toEqual(ANALYSIS_TIPS.metrics.map((tip) => `   • ${tip}`));
  });
});
