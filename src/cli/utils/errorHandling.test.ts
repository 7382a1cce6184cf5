import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { formatErrorWithSuggestions } from '../errors.js';
import { withErrorHandling } from './errorHandling.js';

describe('withErrorHandling', () => {
  let savedExitCode: typeof process.exitCode;
  let stderr: string[];

  beforeEach(() => {
    savedExitCode = process.exitCode;
    stderr = [];
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      stderr.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    process.exitCode = savedExitCode;
    vi.restoreAllMocks();
  });

  it('sets the exit code from the command result', async () => {
    await withErrorHandling(() => Promise.resolve({ exitCode: 2 }));

    expect(process.exitCode).toBe(2);
    expect(stderr).toEqual([]);
  });

  it('formats an escaped Error with suggestions', async () => {
    const error = new Error('stdout closed');

    await withErrorHandling(() => Promise.reject(error));

    expect(process.exitCode).toBe(1);
    expect(stderr).toEqual([formatErrorWithSuggestions(error)]);
  });

  it('formats a non-Error rejection the same way', async () => {
    await withErrorHandling(async () => {
      await Promise.resolve();
      throw 'plain failure';
    });

    expect(process.exitCode).toBe(1);
    expect(stderr[0]?.split('\n')[0]).toBe('Error: plain failure');
    expect(stderr).toEqual([formatErrorWithSuggestions('plain failure')]);
  });
});
