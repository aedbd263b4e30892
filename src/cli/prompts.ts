/**
 * Line-based prompts over readline.
 */
import * as readline from 'node:readline';
import chalk from 'chalk';

export type Ask = (prompt: string) => Promise<string>;

export type Validator = (value: string) => string | undefined | Promise<string | undefined>;

export interface InputPrompt {
  title: string;
  placeholder?: string;
  validate?: Validator;
}

export interface Choice {
  value: string;
  label: string;
  selected?: boolean;
  /** Extra text shown dimmed after the label */
  hint?: string;
}

export interface SelectPrompt {
  title: string;
  choices: Choice[];
}

/**
 * Asks questions through an `ask` function and re-asks until the answer
 * is acceptable.
 */
export class Prompter {
  constructor(
    private readonly ask: Ask,
    private readonly print: (line: string) => void = (line) => console.log(line)
  ) {}

  async input(prompt: InputPrompt): Promise<string> {
    const suffix = prompt.placeholder ? chalk.dim(` (${prompt.placeholder})`) : '';
    while (true) {
      const answer = (await this.ask(`${chalk.bold(prompt.title)}${suffix}: `)).trim();
      const problem = prompt.validate ? await prompt.validate(answer) : undefined;
      if (!problem) {
        return answer;
      }
      this.print(chalk.yellow(`  ${problem}`));
    }
  }

  /**
   * Numbered single choice. A blank answer takes the preselected choice.
   */
  async select(prompt: SelectPrompt): Promise<string> {
    if (prompt.choices.length === 0) {
      return '';
    }
    const preselected = prompt.choices.find((choice) => choice.selected) ?? prompt.choices[0];

    this.print(chalk.bold(prompt.title));
    prompt.choices.forEach((choice, index) => {
      const marker = choice === preselected ? chalk.cyan('>') : ' ';
      this.print(`${marker} ${index + 1}) ${choice.label}${choice.hint ? chalk.dim(` ${choice.hint}`) : ''}`);
    });

    while (true) {
      const answer = (await this.ask(chalk.cyan(`  [1-${prompt.choices.length}]: `))).trim();
      if (!answer) {
        return preselected.value;
      }
      const choice = resolveChoice(answer, prompt.choices);
      if (choice) {
        return choice.value;
      }
      this.print(chalk.yellow(`  Please enter a number between 1 and ${prompt.choices.length}`));
    }
  }

  /**
   * Numbered multiple choice; numbers or values separated by commas.
   * A blank answer selects nothing.
   */
  async multiSelect(prompt: SelectPrompt): Promise<string[]> {
    if (prompt.choices.length === 0) {
      return [];
    }
    this.print(chalk.bold(prompt.title));
    prompt.choices.forEach((choice, index) => {
      this.print(`  ${index + 1}) ${choice.label}${choice.hint ? chalk.dim(` ${choice.hint}`) : ''}`);
    });

    while (true) {
      const answer = (await this.ask(chalk.cyan('  Comma-separated numbers or ids (blank for none): '))).trim();
      if (!answer) {
        return [];
      }
      const tokens = answer.split(',').map((token) => token.trim()).filter(Boolean);
      const picked: string[] = [];
      const invalid: string[] = [];
      for (const token of tokens) {
        const choice = resolveChoice(token, prompt.choices);
        if (!choice) {
          invalid.push(token);
        } else if (!picked.includes(choice.value)) {
          picked.push(choice.value);
        }
      }
      if (invalid.length === 0) {
        return picked;
      }
      this.print(chalk.yellow(`  Unknown choice: ${invalid.join(', ')}`));
    }
  }
}

/**
 * Match an answer against choices by 1-based number or by value.
 */
export function resolveChoice(answer: string, choices: readonly Choice[]): Choice | undefined {
  if (/^\d+$/.test(answer)) {
    return choices[Number(answer) - 1];
  }
  return choices.find((choice) => choice.value === answer);
}

/**
 * Prompter on stdin/stdout. Call `close` when done.
 * Ctrl+C closes the interface, so a pending question rejects with
 * "Prompt cancelled".
 */
export function createTerminalPrompter(
  rl: readline.Interface = readline.createInterface({ input: process.stdin, output: process.stdout })
): { prompter: Prompter; close: () => void } {
  rl.on('SIGINT', () => rl.close());

  const ask: Ask = (prompt) =>
    new Promise((resolve, reject) => {
      const onClose = (): void => reject(new Error('Prompt cancelled'));
      rl.once('close', onClose);
      rl.question(prompt, (answer) => {
        rl.off('close', onClose);
        resolve(answer);
      });
    });

  return { prompter: new Prompter(ask), close: () => rl.close() };
}
