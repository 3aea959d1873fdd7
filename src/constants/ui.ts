export const UI_CONSTANTS = {
  EXIT_DELAY_MS: 100,
  COMMIT_HEADER_RECOMMENDED_LENGTH: 72,
  TYPE_PAGE_SIZE: 20,
  SCOPE_PAGE_SIZE: 10,
  PROMPT_LABELS: {
    COMMIT_TYPE: 'Commit Type',
    SCOPE_SELECT: 'Scope',
    SCOPE_INPUT: 'Scope (optional)',
    SHORT_DESCRIPTION: 'Short Description',
    LONG_DESCRIPTION: 'Long Description (optional)',
    BREAKING_CHANGE: 'Breaking Change',
    BREAKING_CHANGE_NOTE: 'Breaking Change Note',
  },
} as const;

export const FILE_NAMES = {
  SWAP: '.git-cc.swp',
  CONFIG: '.git-cc.yaml',
  MESSAGE_TEMP_PREFIX: 'git-cc-',
  MESSAGE_TEMP_FILE: 'COMMIT_MSG',
} as const;

export const CONVENTIONAL_COMMIT = {
  DEFAULT_TYPES: ['feat', 'fix', 'build', 'chore', 'ci', 'docs', 'refactor', 'test'],
  NO_SCOPE: 'none',
  BREAKING_CHANGE_FOOTER: 'BREAKING CHANGE: ',
} as const;
