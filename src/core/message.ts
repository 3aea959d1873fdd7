import { CONVENTIONAL_COMMIT } from '../constants/ui.js';
import type { AnswerSet } from '../types/common.js';

const hasScope = (scope: string): boolean =>
  scope.length > 0 && scope !== CONVENTIONAL_COMMIT.NO_SCOPE;

/**
 * `type(scope)!: short description`
 */
export const formatHeader = (answers: AnswerSet): string => {
  const scope = hasScope(answers.scope) ? `(${answers.scope})` : '';
  const marker = answers.breakingChange ? '!' : '';
  return `${answers.commitType}${scope}${marker}: ${answers.shortDescription}`;
};

/**
 * Renders the Conventional Commit message for a completed answer set.
 *
 * The breaking-change note is only emitted while the flag is set; a note left
 * over from an earlier session is kept in the answers but never rendered.
 */
export const renderCommitMessage = (answers: AnswerSet): string => {
  const blocks = [formatHeader(answers)];

  if (answers.longDescription.length > 0) {
    blocks.push(answers.longDescription);
  }

  if (answers.breakingChange && answers.breakingChangeNote.length > 0) {
    blocks.push(`${CONVENTIONAL_COMMIT.BREAKING_CHANGE_FOOTER}${answers.breakingChangeNote}`);
  }

  return blocks.join('\n\n');
};
