/**
 * Interactive option resolution on the terminal.
 */
import * as readline from 'node:readline';
import chalk from 'chalk';
import {
  defaultOptionValue,
  type Environment,
  type OptionResolver,
  type VariableValue,
} from '../core/environment/index.js';
import type { TemplateOption } from '../core/descriptor/index.js';
import { substitutePlaceholders } from '../core/render/index.js';

export type AskFunction = (question: string) => Promise<string>;

const YES = ['y', 'yes', 'true'];
const NO = ['n', 'no', 'false'];

/**
 * Asks for every option on stdin/stdout. An empty answer takes the default.
 */
export class PromptOptionResolver implements OptionResolver {
  private rl?: readline.Interface;

  /**
   * @param ask - Replaces the readline prompt (tests, embedding)
   */
  constructor(private readonly ask?: AskFunction) {}

  async resolve(option: TemplateOption, env: Environment): Promise<VariableValue> {
    const label = substitutePlaceholders(option.description || option.name, env);
    const fallback = defaultOptionValue(option);

    switch (option.type) {
      case 'select':
        return this.askSelect(label, option.options ?? [], String(fallback));
      case 'boolean':
        return this.askBoolean(label, fallback === true);
      case 'input':
      default: {
        const answer = (await this.question(`${label} [${String(fallback)}]: `)).trim();
        return answer === '' ? fallback : answer;
      }
    }
  }

  /**
   * Release the terminal. Safe to call when nothing was asked.
   */
  close(): void {
    this.rl?.close();
    this.rl = undefined;
  }

  private async askSelect(label: string, choices: readonly string[], fallback: string): Promise<string> {
    console.log(chalk.bold(label));
    choices.forEach((choice, i) => {
      console.log(`  ${chalk.cyan(String(i + 1))}. ${choice}`);
    });

    for (;;) {
      const answer = (await this.question(`Choose 1-${choices.length} [${fallback}]: `)).trim();
      if (answer === '') {
        return fallback;
      }
      const index = Number.parseInt(answer, 10);
      if (String(index) === answer && index >= 1 && index <= choices.length) {
        return choices[index - 1];
      }
      if (choices.includes(answer)) {
        return answer;
      }
      console.log(chalk.yellow(`Please pick one of: ${choices.join(', ')}`));
    }
  }

  private async askBoolean(label: string, fallback: boolean): Promise<boolean> {
    const hint = fallback ? 'Y/n' : 'y/N';
    for (;;) {
      const answer = (await this.question(`${label} (${hint}): `)).trim().toLowerCase();
      if (answer === '') return fallback;
      if (YES.includes(answer)) return true;
      if (NO.includes(answer)) return false;
      console.log(chalk.yellow('Please answer yes or no'));
    }
  }

  private question(prompt: string): Promise<string> {
    if (this.ask) {
      return this.ask(prompt);
    }
    if (!this.rl) {
      this.rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    }
    const rl = this.rl;
    return new Promise((resolve) => {
      rl.question(prompt, resolve);
    });
  }
}
