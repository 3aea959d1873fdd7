// Turns errors into a title, an explanation and next steps for the terminal

import { lightColors } from './colors.js';
import { isDebugEnabled } from './logger.js';
import { ErrorType, type ErrorContext } from '../types/error-handler.js';

export interface UserFriendlyError {
  title: string;
  message: string;
  suggestions: string[];
  technicalDetails?: string;
}

type ErrorMapping = Omit<UserFriendlyError, 'technicalDetails'>;

const ERROR_MAPPINGS: Record<ErrorType, ErrorMapping> = {
  [ErrorType.NOT_A_REPOSITORY]: {
    title: 'Not a Git Repository',
    message: 'git-cc must run inside a git working tree.',
    suggestions: [
      'Run "git init" to initialize a new Git repository',
      'Navigate to a directory that contains a Git repository',
    ],
  },
  [ErrorType.NOTHING_STAGED]: {
    title: 'Nothing to Commit',
    message: 'There are no staged changes.',
    suggestions: ['Stage changes with "git add <path>" and run git-cc again'],
  },
  [ErrorType.COMMIT_FAILED]: {
    title: 'Commit Failed',
    message: 'git commit exited with an error; its output is shown above.',
    suggestions: [
      'Fix the problem reported by git or your commit hooks',
      'Run git-cc again: your answers were kept and will be offered as defaults',
    ],
  },
  [ErrorType.PROMPT_ABORTED]: {
    title: 'Aborted',
    message: 'The questionnaire was interrupted.',
    suggestions: ['Run git-cc again to continue from your saved answers'],
  },
  [ErrorType.UNKNOWN]: {
    title: 'Unexpected Error',
    message: 'An unexpected error occurred.',
    suggestions: [
      'Try running the command again',
      'Run with DEBUG=true for more detailed error information',
    ],
  },
};

export const createUserFriendlyError = (
  error: Error | string,
  type: ErrorType,
  context?: ErrorContext
): UserFriendlyError => {
  const mapping = ERROR_MAPPINGS[type];
  const originalMessage = typeof error === 'string' ? error : error.message;

  return {
    ...mapping,
    message: originalMessage || mapping.message,
    suggestions: context?.suggestion
      ? [context.suggestion, ...mapping.suggestions]
      : mapping.suggestions,
    technicalDetails: typeof error === 'string' ? error : (error.stack ?? error.message),
  };
};

export const formatUserFriendlyError = (
  friendlyError: UserFriendlyError,
  debug: boolean = isDebugEnabled()
): string => {
  let output = `\n${lightColors.red(`❌ ${friendlyError.title}`)}\n${lightColors.gray(friendlyError.message)}`;

  if (friendlyError.suggestions.length > 0) {
    output += `\n\n${lightColors.yellow('💡 Suggestions:')}`;
    friendlyError.suggestions.forEach((suggestion, index) => {
      output += `\n  ${index + 1}. ${suggestion}`;
    });
  }

  if (friendlyError.technicalDetails && debug) {
    output += `\n\n${lightColors.dim('🔍 Technical Details:')}\n${lightColors.dim(friendlyError.technicalDetails)}`;
  }

  return output;
};

export const displayUserFriendlyError = (
  error: Error | string,
  type: ErrorType,
  context?: ErrorContext
): void => {
  console.error(formatUserFriendlyError(createUserFriendlyError(error, type, context)));
};
