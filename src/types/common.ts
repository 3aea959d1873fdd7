export interface AnswerSet {
  commitType: string;
  scope: string;
  shortDescription: string;
  longDescription: string;
  breakingChange: boolean;
  breakingChangeNote: string;
}

export interface ChoiceSet {
  readonly commitTypes: readonly string[];
  readonly scopes: readonly string[];
}

export interface GitCcConfig {
  useDefaults: boolean;
  customCommitTypes: string[];
  scopes: string[];
}

export interface CommitOptions {
  dryRun?: boolean;
}

export type CommitReadiness =
  | { kind: 'ready'; root: string }
  | { kind: 'not-a-repository' }
  | { kind: 'nothing-staged'; root: string; hasUntracked: boolean };

export type SessionReadResult =
  | { status: 'restored'; answers: AnswerSet }
  | { status: 'missing' }
  | { status: 'corrupt'; reason: string };

export const createEmptyAnswers = (): AnswerSet => ({
  commitType: '',
  scope: '',
  shortDescription: '',
  longDescription: '',
  breakingChange: false,
  breakingChangeNote: '',
});
