export const ERROR_MESSAGES = {
  NOT_A_REPOSITORY: 'not a git repository (or any of the parent directories): .git',
  NOTHING_STAGED: 'nothing added to commit',
  NOTHING_STAGED_UNTRACKED:
    'nothing added to commit but untracked files present (use "git add" to track)',
  COMMIT_FAILED: 'git commit did not complete',
  PROMPT_ABORTED: 'Commit aborted. Your answers so far are saved for the next run.',
} as const;

export const WARNING_MESSAGES = {
  SESSION_RESTORED: 'Restored previous session from .git-cc.swp',
  SESSION_SAVE_FAILED: 'Could not save session state',
  SESSION_CLEAR_FAILED: 'Could not remove session state',
  CONFIG_INVALID_KEY: 'Ignoring invalid config value for',
} as const;

export const SUCCESS_MESSAGES = {
  COMMITTED: 'Commit created',
  SESSION_CLEARED: 'Saved session discarded',
} as const;

export const INFO_MESSAGES = {
  DRY_RUN_COMMIT: 'Dry run - would commit with message:',
  NO_SESSION: 'No saved session to discard',
  RESET_CANCELLED: 'Reset cancelled',
} as const;
