import { readFile, writeFile, rename, rm } from 'fs/promises';
import { join } from 'path';
import { FILE_NAMES } from '../constants/ui.js';
import { WARNING_MESSAGES } from '../constants/messages.js';
import {
  SESSION_STATE_VERSION,
  SessionStateSchema,
  type PersistedSessionState,
} from '../schemas/validation.js';
import { createEmptyAnswers } from '../types/common.js';
import type { AnswerSet, SessionReadResult } from '../types/common.js';
import { consoleLogger, type Logger } from '../utils/logger.js';

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const hasAnyAnswer = (answers: AnswerSet): boolean =>
  answers.breakingChange ||
  [
    answers.commitType,
    answers.scope,
    answers.shortDescription,
    answers.longDescription,
    answers.breakingChangeNote,
  ].some((value) => value !== '');

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const toPersistedState = (answers: AnswerSet): PersistedSessionState => ({
  version: SESSION_STATE_VERSION,
  commit_type: answers.commitType,
  scope: answers.scope,
  short_description: answers.shortDescription,
  long_description: answers.longDescription,
  breaking_change: answers.breakingChange,
  breaking_change_note: answers.breakingChangeNote,
});

export const fromPersistedState = (state: PersistedSessionState): AnswerSet => ({
  commitType: state.commit_type,
  scope: state.scope,
  shortDescription: state.short_description,
  longDescription: state.long_description,
  breakingChange: state.breaking_change,
  breakingChangeNote: state.breaking_change_note,
});

/**
 * Decodes swap file contents without throwing.
 */
export const decodeSessionState = (content: string): SessionReadResult => {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    return { status: 'corrupt', reason: `invalid JSON: ${describeError(error)}` };
  }

  const parsed = SessionStateSchema.safeParse(raw);
  if (!parsed.success) {
    return { status: 'corrupt', reason: 'session state is not an object' };
  }

  return { status: 'restored', answers: fromPersistedState(parsed.data) };
};

export const encodeSessionState = (answers: AnswerSet): string =>
  JSON.stringify(toPersistedState(answers), null, 2);

/**
 * Persists partial questionnaire answers in the repository root so an
 * interrupted run can pick up where it left off.
 *
 * Only `read` reports what happened; `load`, `save` and `clear` never throw.
 */
export class SessionStore {
  readonly filePath: string;
  private readonly tempPath: string;

  constructor(
    repositoryRoot: string,
    private readonly logger: Logger = consoleLogger
  ) {
    this.filePath = join(repositoryRoot, FILE_NAMES.SWAP);
    this.tempPath = `${this.filePath}.tmp`;
  }

  read = async (): Promise<SessionReadResult> => {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return { status: 'missing' };
      }
      return { status: 'corrupt', reason: `unreadable: ${describeError(error)}` };
    }

    return decodeSessionState(content);
  };

  load = async (): Promise<AnswerSet> => {
    const result = await this.read();

    switch (result.status) {
      case 'restored':
        if (hasAnyAnswer(result.answers)) {
          this.logger.warn(WARNING_MESSAGES.SESSION_RESTORED);
        }
        return result.answers;
      case 'corrupt':
        this.logger.debug(`Ignoring session state at ${this.filePath}: ${result.reason}`);
        return createEmptyAnswers();
      case 'missing':
        return createEmptyAnswers();
    }
  };

  /**
   * Replaces the swap file as a whole: the answers go to a sibling temp file
   * which is then renamed over the target, so readers never see a torn write.
   * Saves are sequential, so one fixed temp name is enough.
   */
  save = async (answers: AnswerSet): Promise<boolean> => {
    try {
      await writeFile(this.tempPath, encodeSessionState(answers), { encoding: 'utf-8', mode: 0o644 });
      await rename(this.tempPath, this.filePath);
      this.logger.debug(`Session state saved to ${this.filePath}`);
      return true;
    } catch (error) {
      await rm(this.tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug(`Could not remove ${this.tempPath}: ${describeError(cleanupError)}`);
      });
      this.logger.warn(`${WARNING_MESSAGES.SESSION_SAVE_FAILED}: ${describeError(error)}`);
      return false;
    }
  };

  clear = async (): Promise<void> => {
    try {
      await rm(this.filePath, { force: true });
    } catch (error) {
      this.logger.warn(`${WARNING_MESSAGES.SESSION_CLEAR_FAILED}: ${describeError(error)}`);
    }
  };
}
