export enum ErrorType {
  NOT_A_REPOSITORY = 'NOT_A_REPOSITORY',
  NOTHING_STAGED = 'NOTHING_STAGED',
  COMMIT_FAILED = 'COMMIT_FAILED',
  PROMPT_ABORTED = 'PROMPT_ABORTED',
  UNKNOWN = 'UNKNOWN',
}

// Scripts wrapping git-cc rely on these staying distinct.
export const EXIT_CODES: Record<ErrorType, number> = {
  [ErrorType.NOT_A_REPOSITORY]: 1,
  [ErrorType.NOTHING_STAGED]: 2,
  [ErrorType.COMMIT_FAILED]: 3,
  [ErrorType.PROMPT_ABORTED]: 130,
  [ErrorType.UNKNOWN]: 1,
};

export interface ErrorContext {
  operation?: string;
  file?: string;
  suggestion?: string;
}
