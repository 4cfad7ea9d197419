/**
 * Interactive Prompt Service
 *
 * Asks the operator for whatever generation could not infer. Answers come
 * from an InputSource: inquirer on a terminal, or a scripted list of answers.
 */

import inquirer from 'inquirer';
import { ValidationError } from '../../core/errors.js';
import { VALID_GROUPS, isGroup, type Group, type TddSection } from '../../models/types.js';
import { slugify } from '../inference/slug.js';

/**
 * Error thrown when an answer is needed but none can be read
 */
export class InteractiveError extends Error {
  readonly code = 'INTERACTIVE_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'InteractiveError';
  }
}

/**
 * Where answers come from. `ask` resolves to undefined once input has ended.
 */
export interface InputSource {
  ask(message: string): Promise<string | undefined>;
  notify(message: string): void;
}

/**
 * Reads answers from the terminal through inquirer
 */
export class InquirerInputSource implements InputSource {
  /**
   * Check if the terminal supports interactive input
   */
  isInteractive(): boolean {
    return process.stdin.isTTY === true;
  }

  async ask(message: string): Promise<string | undefined> {
    if (!this.isInteractive()) {
      throw new InteractiveError(
        `Interactive mode requires a terminal with TTY input.\n` +
        `Provide the missing value via command line flags instead.`
      );
    }

    const { answer } = await inquirer.prompt<{ answer: string }>([
      {
        type: 'input',
        name: 'answer',
        message
      }
    ]);

    return answer;
  }

  notify(message: string): void {
    console.error(message);
  }
}

/**
 * Replays a fixed list of answers, then reports end of input
 */
export class ScriptedInputSource implements InputSource {
  private index = 0;
  readonly questions: string[] = [];
  readonly notices: string[] = [];

  constructor(private answers: string[]) {}

  async ask(message: string): Promise<string | undefined> {
    this.questions.push(message);
    if (this.index >= this.answers.length) {
      return undefined;
    }
    return this.answers[this.index++];
  }

  notify(message: string): void {
    this.notices.push(message);
  }
}

function sectionLabel(section: TddSection): string {
  return section.charAt(0) + section.slice(1).toLowerCase();
}

/**
 * Prompt loops for generation inputs
 */
export class PromptService {
  constructor(private input: InputSource = new InquirerInputSource()) {}

  private async read(message: string, field: string): Promise<string> {
    const answer = await this.input.ask(message);
    if (answer === undefined) {
      throw new InteractiveError(`Input ended before a ${field} was provided.`);
    }
    return answer;
  }

  /**
   * Asks once for a GIVEN/WHEN/THEN fragment; a blank answer is fatal
   */
  async promptForSection(section: TddSection): Promise<string> {
    const label = sectionLabel(section);
    const value = (await this.read(`Provide ${label} section:`, `${label} section`)).trim();
    if (!value) {
      throw new ValidationError(`${label} section cannot be blank.`, section);
    }
    return value;
  }

  /**
   * Asks until the answer names a group
   */
  async promptForGroup(): Promise<Group> {
    for (;;) {
      const entered = (await this.read(`Select group (${VALID_GROUPS.join(', ')}):`, 'group')).trim().toLowerCase();
      if (isGroup(entered)) {
        return entered;
      }
      this.input.notify('Invalid group. Please choose one of the supported categories.');
    }
  }

  /**
   * Asks until the answer normalizes to a non-empty slug
   */
  async promptForValue(field: string): Promise<string> {
    for (;;) {
      const candidate = slugify(await this.read(`Enter ${field}:`, field));
      if (candidate) {
        return candidate;
      }
      this.input.notify('Value cannot be empty.');
    }
  }
}
