import { UI_CONSTANTS } from '../constants/ui.js';
import { NO_SCOPE } from './choices.js';
import type { AnswerSet, ChoiceSet } from '../types/common.js';
import type { Prompter } from '../utils/prompts.js';

export type QuestionnaireStep =
  | 'SelectType'
  | 'SelectOrEnterScope'
  | 'ShortDescription'
  | 'LongDescription'
  | 'BreakingChangeFlag'
  | 'BreakingChangeNote';

/**
 * Called after every answered step with the answers so far.
 */
export type Checkpoint = (answers: AnswerSet, step: QuestionnaireStep) => Promise<unknown>;

const LABELS = UI_CONSTANTS.PROMPT_LABELS;

const requireValue = (input: string): string | boolean =>
  input.trim().length > 0 || 'A value is required';

/**
 * Drives the commit questionnaire. Restored answers only ever act as
 * defaults; every step is asked again on each run.
 */
export class CommitQuestionnaire {
  constructor(
    private readonly prompter: Prompter,
    private readonly choices: ChoiceSet,
    private readonly checkpoint: Checkpoint = async () => undefined
  ) {}

  run = async (restored: AnswerSet): Promise<AnswerSet> => {
    const answers: AnswerSet = { ...restored };

    answers.commitType = await this.selectType(restored.commitType);
    await this.checkpoint({ ...answers }, 'SelectType');

    answers.scope = await this.selectOrEnterScope(restored.scope);
    await this.checkpoint({ ...answers }, 'SelectOrEnterScope');

    answers.shortDescription = (
      await this.prompter.input({
        message: LABELS.SHORT_DESCRIPTION,
        default: restored.shortDescription,
      })
    ).trim();
    await this.checkpoint({ ...answers }, 'ShortDescription');

    answers.longDescription = (
      await this.prompter.input({
        message: LABELS.LONG_DESCRIPTION,
        default: restored.longDescription,
        multiline: true,
      })
    ).trim();
    await this.checkpoint({ ...answers }, 'LongDescription');

    answers.breakingChange = await this.prompter.confirm({
      message: LABELS.BREAKING_CHANGE,
      default: restored.breakingChange,
    });
    await this.checkpoint({ ...answers }, 'BreakingChangeFlag');

    if (answers.breakingChange) {
      answers.breakingChangeNote = (
        await this.prompter.input({
          message: LABELS.BREAKING_CHANGE_NOTE,
          default: restored.breakingChangeNote,
        })
      ).trim();
      await this.checkpoint({ ...answers }, 'BreakingChangeNote');
    }

    return answers;
  };

  private readonly selectType = async (previous: string): Promise<string> => {
    const { commitTypes } = this.choices;

    // Nothing configured to pick from: fall back to typing the type
    if (commitTypes.length === 0) {
      const typed = await this.prompter.input({
        message: LABELS.COMMIT_TYPE,
        default: previous,
        validate: requireValue,
      });
      return typed.trim();
    }

    return this.prompter.list({
      message: LABELS.COMMIT_TYPE,
      choices: commitTypes,
      default: commitTypes.includes(previous) ? previous : undefined,
      pageSize: UI_CONSTANTS.TYPE_PAGE_SIZE,
    });
  };

  private readonly selectOrEnterScope = async (previous: string): Promise<string> => {
    const { scopes } = this.choices;

    if (scopes.length === 0) {
      const typed = await this.prompter.input({
        message: LABELS.SCOPE_INPUT,
        default: previous,
      });
      return typed.trim();
    }

    let defaultScope: string | undefined;
    if (scopes.includes(previous)) {
      defaultScope = previous;
    } else if (scopes.includes(NO_SCOPE)) {
      defaultScope = NO_SCOPE;
    }

    return this.prompter.list({
      message: LABELS.SCOPE_SELECT,
      choices: scopes,
      default: defaultScope,
      pageSize: UI_CONSTANTS.SCOPE_PAGE_SIZE,
    });
  };
}
