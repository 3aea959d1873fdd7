import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { lightColors } from '../utils/colors.js';
import { createPrompter, type Prompter } from '../utils/prompts.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { CliError } from '../utils/error-handler.js';
import { GitService, type GitGateway } from '../services/git.js';
import { loadConfig } from '../config.js';
import { resolveChoiceSet } from './choices.js';
import { CommitQuestionnaire } from './questionnaire.js';
import { SessionStore } from './session-store.js';
import { formatHeader, renderCommitMessage } from './message.js';
import { ErrorType } from '../types/error-handler.js';
import type { AnswerSet, CommitOptions } from '../types/common.js';
import {
  ERROR_MESSAGES,
  INFO_MESSAGES,
  SUCCESS_MESSAGES,
} from '../constants/messages.js';
import { FILE_NAMES, UI_CONSTANTS } from '../constants/ui.js';

export interface GitCcDependencies {
  git?: GitGateway;
  prompter?: Prompter;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

export class GitCc {
  private readonly git: GitGateway;
  private readonly prompter: Prompter;
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;

  constructor(dependencies: GitCcDependencies = {}) {
    this.logger = dependencies.logger ?? consoleLogger;
    this.git = dependencies.git ?? new GitService(process.cwd(), this.logger);
    this.prompter = dependencies.prompter ?? createPrompter();
    this.env = dependencies.env ?? process.env;
  }

  /**
   * Asks for the commit details and hands the rendered message to git.
   * The saved session survives a failed commit so a retry starts from the
   * same answers.
   */
  commit = async (options: CommitOptions = {}): Promise<string> => {
    const root = await this.requireCommitReadyRoot();

    const { config } = await loadConfig(root, this.env, this.logger);
    const choices = resolveChoiceSet(config);
    this.logger.debug(`Commit types: ${choices.commitTypes.join(', ')}`);
    this.logger.debug(`Scopes: ${choices.scopes.join(', ') || '(free text)'}`);

    const store = new SessionStore(root, this.logger);
    const restored = await store.load();

    const questionnaire = new CommitQuestionnaire(this.prompter, choices, (answers) =>
      store.save(answers)
    );

    let answers: AnswerSet;
    try {
      answers = await questionnaire.run(restored);
    } finally {
      this.prompter.close?.();
    }
    await store.save(answers);

    const message = renderCommitMessage(answers);
    this.noteLongHeader(answers);

    if (options.dryRun) {
      this.logger.info(`${lightColors.blue(INFO_MESSAGES.DRY_RUN_COMMIT)}\n${message}`);
      return message;
    }

    await this.commitMessage(message);
    await store.clear();
    this.logger.info(lightColors.green(`✅ ${SUCCESS_MESSAGES.COMMITTED}: ${formatHeader(answers)}`));
    return message;
  };

  showConfig = async (): Promise<void> => {
    const root = await this.requireRepositoryRoot();
    const { config, source, path } = await loadConfig(root, this.env, this.logger);
    const choices = resolveChoiceSet(config);

    let output = `${lightColors.blue('Current configuration:')}
  source: ${source === 'file' ? path : 'built-in defaults'}
  use_defaults: ${config.useDefaults}
  commit types: ${choices.commitTypes.join(', ') || '(none, entered as text)'}`;
    output += `\n  scopes: ${choices.scopes.join(', ') || '(free text)'}`;

    this.logger.info(output);
  };

  reset = async (force = false): Promise<void> => {
    const root = await this.requireRepositoryRoot();
    const store = new SessionStore(root, this.logger);

    if ((await store.read()).status === 'missing') {
      this.logger.info(lightColors.yellow(INFO_MESSAGES.NO_SESSION));
      return;
    }

    let confirmed = force;
    if (!confirmed) {
      try {
        confirmed = await this.prompter.confirm({
          message: `Discard the saved answers in ${FILE_NAMES.SWAP}?`,
          default: false,
        });
      } finally {
        this.prompter.close?.();
      }
    }

    if (!confirmed) {
      this.logger.info(lightColors.yellow(INFO_MESSAGES.RESET_CANCELLED));
      return;
    }

    await store.clear();
    this.logger.info(lightColors.green(`✅ ${SUCCESS_MESSAGES.SESSION_CLEARED}`));
  };

  private readonly requireCommitReadyRoot = async (): Promise<string> => {
    const readiness = await this.git.getCommitReadiness();

    switch (readiness.kind) {
      case 'ready':
        this.logger.debug(`Repository root: ${readiness.root}`);
        return readiness.root;
      case 'not-a-repository':
        throw new CliError(ERROR_MESSAGES.NOT_A_REPOSITORY, ErrorType.NOT_A_REPOSITORY, {
          operation: 'commit',
        });
      case 'nothing-staged':
        throw new CliError(
          readiness.hasUntracked
            ? ERROR_MESSAGES.NOTHING_STAGED_UNTRACKED
            : ERROR_MESSAGES.NOTHING_STAGED,
          ErrorType.NOTHING_STAGED,
          { operation: 'commit' }
        );
    }
  };

  private readonly requireRepositoryRoot = async (): Promise<string> => {
    const readiness = await this.git.getCommitReadiness();
    if (readiness.kind === 'not-a-repository') {
      throw new CliError(ERROR_MESSAGES.NOT_A_REPOSITORY, ErrorType.NOT_A_REPOSITORY);
    }
    return readiness.root;
  };

  private readonly commitMessage = async (message: string): Promise<void> => {
    const tempDir = await mkdtemp(join(tmpdir(), FILE_NAMES.MESSAGE_TEMP_PREFIX));
    const messageFile = join(tempDir, FILE_NAMES.MESSAGE_TEMP_FILE);

    try {
      await writeFile(messageFile, message, 'utf-8');
      this.logger.debug(`temp file: ${messageFile}`);
      await this.git.commitWithMessageFile(messageFile);
    } catch (error) {
      throw new CliError(
        ERROR_MESSAGES.COMMIT_FAILED,
        ErrorType.COMMIT_FAILED,
        { operation: 'commit', file: messageFile },
        { cause: error }
      );
    } finally {
      await rm(tempDir, { recursive: true, force: true });
    }
  };

  private readonly noteLongHeader = (answers: AnswerSet): void => {
    const header = formatHeader(answers);
    if (header.length > UI_CONSTANTS.COMMIT_HEADER_RECOMMENDED_LENGTH) {
      this.logger.debug(
        `Commit header is ${header.length} characters (recommended ${UI_CONSTANTS.COMMIT_HEADER_RECOMMENDED_LENGTH} or less)`
      );
    }
  };
}
