/**
 * Terminal prompts for `worklog init`.
 *
 * A Prompter owns one readline interface and asks typed questions: free
 * text with a default and validation, masked secrets, one of a fixed set of
 * answers, and yes/no. Closing the interface mid-question rejects with
 * PromptCancelledError.
 */

import { createInterface, type Interface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';

export class PromptCancelledError extends Error {
  constructor() {
    super('Setup cancelled');
    this.name = 'PromptCancelledError';
  }
}

/** Returns an error message for a bad answer, or null to accept it. */
export type AnswerCheck = (answer: string) => string | null;

export interface TextQuestion {
  defaultValue?: string;
  required?: boolean;
  check?: AnswerCheck;
}

export class Prompter {
  private readonly rl: Interface;

  constructor(rl: Interface = createInterface({ input: stdin, output: stdout })) {
    this.rl = rl;
  }

  /** Re-asks until the answer passes `required` and `check`. */
  async text(label: string, question: TextQuestion = {}): Promise<string> {
    const { defaultValue, required = false, check } = question;
    const hint = defaultValue ? ` [${defaultValue}]` : '';

    for (;;) {
      const answer = (await this.raw(`${label}${hint}: `)) || defaultValue || '';
      const problem = required && !answer ? 'A value is required.' : (check?.(answer) ?? null);
      if (!problem) return answer;
      say.warn(problem);
    }
  }

  /** Masked input on a TTY; piped input is read as a plain line. */
  async secret(label: string): Promise<string> {
    if (!stdin.isTTY) return this.raw(`${label}: `);

    stdout.write(`${label}: `);
    const typed = await readMasked();
    if (typed === null) {
      this.close();
      throw new PromptCancelledError();
    }
    return typed.trim();
  }

  /** Case-insensitive pick from `options`; Enter keeps `defaultValue`. */
  async choice<T extends string>(label: string, options: readonly T[], defaultValue: T): Promise<T> {
    for (;;) {
      const answer = (await this.raw(`${label} (${options.join('/')}) [${defaultValue}]: `)).toLowerCase();
      if (!answer) return defaultValue;

      const picked = options.find((option) => option.toLowerCase() === answer);
      if (picked) return picked;
      say.warn(`Answer one of: ${options.join(', ')}`);
    }
  }

  async confirm(label: string, defaultYes: boolean): Promise<boolean> {
    const answer = (await this.raw(`${label} ${defaultYes ? '[Y/n]' : '[y/N]'}: `)).toLowerCase();
    if (!answer) return defaultYes;
    return answer === 'y' || answer === 'yes';
  }

  close(): void {
    this.rl.close();
  }

  private async raw(query: string): Promise<string> {
    try {
      return (await this.rl.question(query)).trim();
    } catch (error) {
      if (error instanceof Error && error.message === 'readline was closed') {
        throw new PromptCancelledError();
      }
      throw error;
    }
  }
}

/** Resolves with the typed text on Enter or Ctrl+D, or null on Ctrl+C. */
function readMasked(): Promise<string | null> {
  return new Promise((resolve) => {
    let typed = '';

    const onData = (data: Buffer) => {
      const key = data.toString();

      if (key === '\r' || key === '\n' || key === '\u0004') {
        done(typed);
      } else if (key === '\u0003') {
        done(null);
      } else if (key === '\u007F' || key === '\b') {
        if (typed) {
          typed = typed.slice(0, -1);
          stdout.write('\b \b');
        }
      } else if (key.charCodeAt(0) >= 32) {
        typed += key;
        stdout.write('*'.repeat(key.length));
      }
    };

    const done = (result: string | null) => {
      stdin.removeListener('data', onData);
      stdin.setRawMode(false);
      stdin.pause();
      stdout.write('\n');
      resolve(result);
    };

    stdin.setRawMode(true);
    stdin.resume();
    stdin.on('data', onData);
  });
}

// ─── Output ──────────────────────────────────────────────────

const ansi = (code: number) => (text: string) => `\x1b[${code}m${text}\x1b[0m`;
const bold = ansi(1);
const dim = ansi(2);

export const say = {
  header(text: string): void {
    console.log(`\n${bold(ansi(36)(text))}`);
    console.log(dim('─'.repeat(text.length)));
  },
  step(step: number, total: number, text: string): void {
    console.log(`\n${bold(`[${step}/${total}]`)} ${text}`);
  },
  ok: (text: string): void => console.log(`${ansi(32)('[ok]')} ${text}`),
  warn: (text: string): void => console.log(`${ansi(33)('[!]')} ${text}`),
  info: (text: string): void => console.log(`${dim('[i]')} ${text}`),
};
