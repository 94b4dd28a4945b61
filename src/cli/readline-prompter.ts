/**
 * Terminal selection prompter
 *
 * Numbered menus on a readline interface. Closing the input (Ctrl-D) is
 * treated as cancelling whatever question is pending.
 */

import { createInterface, type Interface } from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';
import type { DimensionScalar } from '../types/dimensions.js';
import type { CommandOption, SelectionPrompter } from '../session/prompter.js';

export interface ReadlinePrompterOptions {
  input?: Readable;
  output?: Writable;
}

export class ReadlinePrompter implements SelectionPrompter {
  private readonly rl: Interface;
  private readonly output: Writable;
  private closed = false;
  private readonly closedSignal: Promise<null>;

  constructor(options: ReadlinePrompterOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.rl = createInterface({ input: options.input ?? process.stdin, output: this.output, terminal: false });
    this.closedSignal = new Promise((resolve) => {
      this.rl.once('close', () => {
        this.closed = true;
        resolve(null);
      });
    });
  }

  async ask(dimension: string, candidates: readonly DimensionScalar[]): Promise<readonly DimensionScalar[] | null> {
    this.writeLine(`Please pick from the below values for dimension '${dimension}':`);
    const labels = candidateLabels(candidates);
    labels.forEach((label, index) => this.writeLine(`  ${index + 1}) ${label}`));

    for (;;) {
      const answer = await this.question('Numbers separated by commas (empty to abort): ');
      if (answer === null || answer.length === 0) {
        return null;
      }

      const indices = parseIndices(answer, candidates.length);
      if (indices === undefined) {
        this.writeLine(`Please enter numbers between 1 and ${candidates.length}`);
        continue;
      }
      return [...new Set(indices)].map((index) => candidates[index - 1]);
    }
  }

  async askRunNumber(
    message = "What's the build number of the run you want to display?"
  ): Promise<number | null> {
    for (;;) {
      const answer = await this.question(`${message} `);
      if (answer === null || answer.length === 0) {
        return null;
      }
      if (/^\d+$/.test(answer)) {
        return Number.parseInt(answer, 10);
      }
      this.writeLine('Please enter a valid build number');
    }
  }

  async chooseCommand<C extends string>(
    message: string,
    options: readonly CommandOption<C>[],
    defaultCommand?: C
  ): Promise<C | null> {
    this.writeLine(message);
    options.forEach((option, index) => {
      const marker = option.command === defaultCommand ? ' (default)' : '';
      this.writeLine(`  ${index + 1}) ${option.label}${marker}`);
    });

    for (;;) {
      const answer = await this.question('> ');
      if (answer === null) {
        return null;
      }
      if (answer.length === 0 && defaultCommand !== undefined) {
        return defaultCommand;
      }

      const indices = parseIndices(answer, options.length);
      if (indices !== undefined && indices.length === 1) {
        return options[indices[0] - 1].command;
      }
      this.writeLine(`Please enter a number between 1 and ${options.length}`);
    }
  }

  close(): void {
    this.rl.close();
  }

  /**
   * Trimmed answer, or null once the input has closed.
   */
  private async question(prompt: string): Promise<string | null> {
    if (this.closed) {
      return null;
    }

    const answer = this.rl.question(prompt).catch((error: unknown) => {
      if (this.closed) {
        return null;
      }
      throw error;
    });
    const result = await Promise.race([answer, this.closedSignal]);
    return result === null ? null : result.trim();
  }

  private writeLine(line: string): void {
    this.output.write(`${line}\n`);
  }
}

/**
 * Menu labels for candidate values. When numbers and strings are offered
 * together, strings are quoted so that `2` and `"2"` can be told apart.
 */
export function candidateLabels(candidates: readonly DimensionScalar[]): string[] {
  const mixed =
    candidates.some((candidate) => typeof candidate === 'number') &&
    candidates.some((candidate) => typeof candidate === 'string');

  return candidates.map((candidate) =>
    mixed && typeof candidate === 'string' ? JSON.stringify(candidate) : String(candidate)
  );
}

/**
 * 1-based indices from "1, 3"; undefined unless every entry is in range.
 */
export function parseIndices(answer: string, count: number): number[] | undefined {
  const tokens = answer.split(',').map((token) => token.trim());
  const indices: number[] = [];

  for (const token of tokens) {
    if (!/^\d+$/.test(token)) {
      return undefined;
    }
    const index = Number.parseInt(token, 10);
    if (index < 1 || index > count) {
      return undefined;
    }
    indices.push(index);
  }

  return indices;
}
