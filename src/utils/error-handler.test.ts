import { beforeEach, describe, expect, it, vi } from 'vitest';
import { CliError, toCliError, withErrorHandling } from './error-handler.js';
import {
  createUserFriendlyError,
  formatUserFriendlyError,
} from './enhanced-error-handler.js';
import { PromptAbortedError } from './prompts.js';
import { exitProcess } from './process-utils.js';
import { lightColors } from './colors.js';
import { ErrorType } from '../types/error-handler.js';

vi.mock('./process-utils.js', () => ({
  exitProcess: vi.fn(),
}));

describe('CliError', () => {
  it.each([
    [ErrorType.NOT_A_REPOSITORY, 1],
    [ErrorType.NOTHING_STAGED, 2],
    [ErrorType.COMMIT_FAILED, 3],
    [ErrorType.PROMPT_ABORTED, 130],
    [ErrorType.UNKNOWN, 1],
  ])('should map %s to exit code %i', (type, exitCode) => {
    expect(new CliError('failed', type).exitCode).toBe(exitCode);
  });

  it('should only know the failures the CLI raises', () => {
    expect(Object.values(ErrorType)).toEqual([
      'NOT_A_REPOSITORY',
      'NOTHING_STAGED',
      'COMMIT_FAILED',
      'PROMPT_ABORTED',
      'UNKNOWN',
    ]);
  });

  it('should keep the underlying error as its cause', () => {
    const cause = new Error('git exited with code 1');
    const error = new CliError(
      'commit failed',
      ErrorType.COMMIT_FAILED,
      { operation: 'commit' },
      { cause }
    );

    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({ operation: 'commit' });
  });
});

describe('toCliError', () => {
  it('should keep a CliError as it is', () => {
    const error = new CliError('nothing added to commit', ErrorType.NOTHING_STAGED);

    expect(toCliError(error)).toBe(error);
  });

  it('should classify an aborted prompt', () => {
    const converted = toCliError(new PromptAbortedError());

    expect(converted.type).toBe(ErrorType.PROMPT_ABORTED);
    expect(converted.exitCode).toBe(130);
  });

  it('should wrap anything else as unknown', () => {
    const converted = toCliError('boom', { operation: 'commit' });

    expect(converted).toMatchObject({
      type: ErrorType.UNKNOWN,
      message: 'boom',
      context: { operation: 'commit' },
    });
  });
});

describe('createUserFriendlyError', () => {
  it('should use the error message with the suggestions for its type', () => {
    const friendly = createUserFriendlyError(
      new CliError('nothing added to commit', ErrorType.NOTHING_STAGED),
      ErrorType.NOTHING_STAGED
    );

    expect(friendly).toMatchObject({
      title: 'Nothing to Commit',
      message: 'nothing added to commit',
      suggestions: ['Stage changes with "git add <path>" and run git-cc again'],
    });
  });

  it('should put a context suggestion first', () => {
    const friendly = createUserFriendlyError('no tty', ErrorType.PROMPT_ABORTED, {
      suggestion: 'Run git-cc from an interactive terminal',
    });

    expect(friendly.suggestions).toEqual([
      'Run git-cc from an interactive terminal',
      'Run git-cc again to continue from your saved answers',
    ]);
  });
});

describe('formatUserFriendlyError', () => {
  const friendly = {
    title: 'Commit Failed',
    message: 'git commit did not complete',
    suggestions: ['Fix the hook', 'Run again'],
    technicalDetails: 'Error: exit 1',
  };

  it('should list numbered suggestions', () => {
    expect(lightColors.strip(formatUserFriendlyError(friendly, false))).toBe(
      '\n❌ Commit Failed\ngit commit did not complete\n\n💡 Suggestions:\n  1. Fix the hook\n  2. Run again'
    );
  });

  it('should add technical details in debug mode', () => {
    expect(lightColors.strip(formatUserFriendlyError(friendly, true))).toBe(
      '\n❌ Commit Failed\ngit commit did not complete\n\n💡 Suggestions:\n  1. Fix the hook\n  2. Run again\n\n🔍 Technical Details:\nError: exit 1'
    );
  });
});

describe('withErrorHandling', () => {
  beforeEach(() => {
    vi.mocked(exitProcess).mockClear();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('should exit with the code of the error type', async () => {
    await withErrorHandling(async () => {
      throw new CliError('git commit did not complete', ErrorType.COMMIT_FAILED);
    });

    expect(exitProcess).toHaveBeenCalledWith(3);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('should not exit when the action succeeds', async () => {
    await withErrorHandling(async () => undefined);

    expect(exitProcess).not.toHaveBeenCalled();
  });
});
