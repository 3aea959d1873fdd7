import { ERROR_MESSAGES } from '../constants/messages.js';
import { EXIT_CODES, ErrorType, type ErrorContext } from '../types/error-handler.js';
import { displayUserFriendlyError } from './enhanced-error-handler.js';
import { PromptAbortedError } from './prompts.js';
import { exitProcess } from './process-utils.js';

/**
 * An expected failure: reported to the user and mapped to an exit code.
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly type: ErrorType,
    public readonly context: ErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CliError';
  }

  get exitCode(): number {
    return EXIT_CODES[this.type];
  }
}

export const toCliError = (error: unknown, context: ErrorContext = {}): CliError => {
  if (error instanceof CliError) {
    return error;
  }
  if (error instanceof PromptAbortedError) {
    return new CliError(ERROR_MESSAGES.PROMPT_ABORTED, ErrorType.PROMPT_ABORTED, context, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CliError(message, ErrorType.UNKNOWN, context, { cause: error });
};

export const reportError = (error: unknown, context: ErrorContext = {}): CliError => {
  const cliError = toCliError(error, context);
  const cause = cliError.cause instanceof Error ? cliError.cause : cliError;
  displayUserFriendlyError(
    cliError.type === ErrorType.UNKNOWN ? cause : cliError,
    cliError.type,
    cliError.context
  );
  return cliError;
};

/**
 * Runs a CLI action; any error is displayed and ends the process with the
 * exit code of its type.
 */
export const withErrorHandling = async (
  action: () => Promise<void>,
  context: ErrorContext = {}
): Promise<void> => {
  try {
    await action();
  } catch (error) {
    const cliError = reportError(error, context);
    exitProcess(cliError.exitCode);
  }
};
