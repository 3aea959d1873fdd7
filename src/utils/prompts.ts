// Lightweight readline prompts in place of inquirer
// Covers the three widgets the commit questionnaire needs

import { createInterface, type Interface } from 'readline';
import { lightColors } from './colors.js';

export interface BasePromptOptions {
  message: string;
}

export interface ConfirmOptions extends BasePromptOptions {
  default?: boolean;
}

export interface InputOptions extends BasePromptOptions {
  default?: string;
  multiline?: boolean;
  validate?: (input: string) => string | boolean;
}

export interface ListChoice {
  name: string;
  value: string;
}

export interface ListOptions extends BasePromptOptions {
  choices: ReadonlyArray<string | ListChoice>;
  default?: string;
  pageSize?: number;
}

/**
 * The "ask the user" capability the questionnaire is written against.
 */
export interface Prompter {
  list(options: ListOptions): Promise<string>;
  input(options: InputOptions): Promise<string>;
  confirm(options: ConfirmOptions): Promise<boolean>;
  close?(): void;
}

export class PromptAbortedError extends Error {
  constructor(message = 'Prompt aborted') {
    super(message);
    this.name = 'PromptAbortedError';
  }
}

export const normalizeChoices = (choices: ListOptions['choices']): ListChoice[] =>
  choices.map((choice) =>
    typeof choice === 'string' ? { name: choice, value: choice } : choice
  );

/**
 * Maps a typed answer to a choice value: a 1-based index, a choice name or
 * value, or empty for the default. Returns `undefined` when nothing matches.
 */
export const resolveListAnswer = (
  answer: string,
  choices: readonly ListChoice[],
  defaultValue?: string
): string | undefined => {
  const trimmed = answer.trim();

  if (trimmed === '') {
    return choices.some((choice) => choice.value === defaultValue) ? defaultValue : undefined;
  }

  if (/^\d+$/.test(trimmed)) {
    const index = Number.parseInt(trimmed, 10);
    if (index >= 1 && index <= choices.length) {
      return choices[index - 1].value;
    }
  }

  const lowered = trimmed.toLowerCase();
  const found = choices.find(
    (choice) => choice.value.toLowerCase() === lowered || choice.name.toLowerCase() === lowered
  );
  return found?.value;
};

export const parseConfirmAnswer = (answer: string, defaultValue: boolean): boolean | undefined => {
  switch (answer.trim().toLowerCase()) {
    case '':
      return defaultValue;
    case 'y':
    case 'yes':
      return true;
    case 'n':
    case 'no':
      return false;
    default:
      return undefined;
  }
};

export const CLEAR_ANSWER = '-';

/**
 * Single-line answers are trimmed; multi-line answers keep their lines as
 * typed. An empty answer falls back to the default and a lone `-` clears it.
 */
export const resolveInputAnswer = (
  lines: readonly string[],
  defaultValue = '',
  multiline = false
): string => {
  if (lines.length === 1 && lines[0].trim() === CLEAR_ANSWER) {
    return '';
  }
  if (multiline) {
    return lines.length === 0 ? defaultValue : lines.join('\n');
  }
  return lines.join(' ').trim() || defaultValue;
};

interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream & { isTTY?: boolean };
}

export class LightPrompts implements Prompter {
  private rl: Interface | null = null;
  private pendingReject: ((error: Error) => void) | null = null;

  constructor(
    private readonly streams: PromptStreams = { input: process.stdin, output: process.stdout }
  ) {}

  private createReadline(): Interface {
    if (!this.rl) {
      const rl = createInterface({
        input: this.streams.input,
        output: this.streams.output,
        terminal: Boolean(this.streams.output.isTTY),
      });

      rl.on('SIGINT', () => this.abort());
      rl.on('close', () => {
        this.rl = null;
        this.abort();
      });
      this.rl = rl;
    }
    return this.rl;
  }

  private abort(): void {
    const reject = this.pendingReject;
    this.pendingReject = null;
    if (reject) {
      reject(new PromptAbortedError());
    }
  }

  close(): void {
    if (this.rl) {
      const rl = this.rl;
      this.rl = null;
      rl.close();
    }
  }

  private ask(question: string): Promise<string> {
    const rl = this.createReadline();

    return new Promise((resolve, reject) => {
      this.pendingReject = reject;
      rl.question(question, (answer: string) => {
        this.pendingReject = null;
        resolve(answer);
      });
    });
  }

  private write(text: string): void {
    this.streams.output.write(`${text}\n`);
  }

  private formatMessage(message: string, suffix = ''): string {
    return `${lightColors.cyan('?')} ${lightColors.bold(message)}${suffix} `;
  }

  async confirm(options: ConfirmOptions): Promise<boolean> {
    const defaultValue = options.default ?? false;
    const suffix = lightColors.dim(defaultValue ? ' (Y/n)' : ' (y/N)');

    for (;;) {
      const answer = await this.ask(this.formatMessage(options.message, suffix));
      const result = parseConfirmAnswer(answer, defaultValue);
      if (result !== undefined) {
        return result;
      }
      this.write(lightColors.red('Please answer with y/yes or n/no.'));
    }
  }

  async input(options: InputOptions): Promise<string> {
    const defaultValue = options.default ?? '';
    const hint = options.multiline ? ' [finish with an empty line]' : '';
    const defaultSuffix =
      defaultValue && !options.multiline ? ` (${defaultValue}, ${CLEAR_ANSWER} to clear)` : '';

    for (;;) {
      let result: string;

      if (options.multiline) {
        this.write(this.formatMessage(options.message, lightColors.dim(hint)));
        if (defaultValue) {
          this.write(
            lightColors.dim(`  Press enter to keep, or enter ${CLEAR_ANSWER} to clear:\n${defaultValue}`)
          );
        }
        const lines: string[] = [];
        for (;;) {
          const line = await this.ask(lightColors.dim('  > '));
          if (line.trim() === '') {
            break;
          }
          lines.push(line);
        }
        result = resolveInputAnswer(lines, defaultValue, true);
      } else {
        const answer = await this.ask(
          this.formatMessage(options.message, lightColors.dim(defaultSuffix))
        );
        result = resolveInputAnswer([answer], defaultValue);
      }

      const validation = options.validate ? options.validate(result) : true;
      if (validation === true) {
        return result;
      }
      this.write(lightColors.red(typeof validation === 'string' ? validation : 'Invalid input'));
    }
  }

  async list(options: ListOptions): Promise<string> {
    const choices = normalizeChoices(options.choices);
    const visible = choices.slice(0, options.pageSize ?? choices.length);

    this.write(this.formatMessage(options.message));
    visible.forEach((choice, index) => {
      const marker = choice.value === options.default ? lightColors.cyan('❯') : ' ';
      this.write(` ${marker} ${lightColors.dim(`${index + 1})`)} ${choice.name}`);
    });
    if (visible.length < choices.length) {
      this.write(lightColors.dim(`   ... ${choices.length - visible.length} more, type the name`));
    }

    const hasDefault = choices.some((choice) => choice.value === options.default);
    const suffix = hasDefault ? lightColors.dim(` (${options.default})`) : '';

    for (;;) {
      const answer = await this.ask(`${lightColors.cyan('  Answer:')}${suffix} `);
      const selected = resolveListAnswer(answer, choices, options.default);
      if (selected !== undefined) {
        return selected;
      }
      this.write(
        lightColors.red(`Please choose a number between 1-${choices.length} or enter the choice name.`)
      );
    }
  }
}

export const createPrompter = (): LightPrompts => new LightPrompts();
