import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { PassThrough } from 'node:stream';
import { createInterface } from 'node:readline/promises';
import { Prompter, PromptCancelledError } from './prompt.js';

/** A Prompter whose questions are answered from `answers`, one line per question. */
function scripted(answers: string[]) {
  const input = new PassThrough();
  const output = new PassThrough();
  const questions: string[] = [];

  output.on('data', (chunk: Buffer) => {
    questions.push(chunk.toString());
    const next = answers.shift();
    if (next !== undefined) input.write(`${next}\n`);
  });

  const rl = createInterface({ input, output, terminal: false });
  return { prompter: new Prompter(rl), questions };
}

describe('Prompter', () => {
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    log.mockRestore();
  });

  describe('text', () => {
    it('shows and falls back to the default on an empty answer', async () => {
      const { prompter, questions } = scripted(['']);

      expect(await prompter.text('Role', { defaultValue: 'Developer' })).toBe('Developer');
      expect(questions).toEqual(['Role [Developer]: ']);
      prompter.close();
    });

    it('asks again until the check passes', async () => {
      const { prompter, questions } = scripted(['zero', ' 7.5 ']);

      const hours = await prompter.text('Hours', {
        check: (v) => (Number(v) > 0 ? null : 'Must be a positive number'),
      });

      expect(hours).toBe('7.5');
      expect(questions).toHaveLength(2);
      expect(log).toHaveBeenCalledWith(expect.stringContaining('Must be a positive number'));
      prompter.close();
    });

    it('insists on a value when required', async () => {
      const { prompter } = scripted(['', 'PAY']);

      expect(await prompter.text('Project', { required: true })).toBe('PAY');
      expect(log).toHaveBeenCalledWith(expect.stringContaining('A value is required.'));
      prompter.close();
    });
  });

  describe('choice', () => {
    it('matches case-insensitively and returns the option as spelled', async () => {
      const { prompter, questions } = scripted(['maybe', 'ONSHORE']);

      const site = await prompter.choice('Site', ['Onshore', 'Offshore'], 'Offshore');

      expect(site).toBe('Onshore');
      expect(questions[0]).toBe('Site (Onshore/Offshore) [Offshore]: ');
      expect(log).toHaveBeenCalledWith(expect.stringContaining('Answer one of: Onshore, Offshore'));
      prompter.close();
    });

    it('keeps the default on Enter', async () => {
      const { prompter } = scripted(['']);

      expect(await prompter.choice('Billable', ['Yes', 'No'], 'No')).toBe('No');
      prompter.close();
    });
  });

  describe('confirm', () => {
    it('uses the default on Enter and accepts y/yes', async () => {
      const { prompter, questions } = scripted(['', 'YES', 'n']);

      expect(await prompter.confirm('Skip validation?', false)).toBe(false);
      expect(await prompter.confirm('Skip validation?', false)).toBe(true);
      expect(await prompter.confirm('Continue?', true)).toBe(false);
      expect(questions[0]).toBe('Skip validation? [y/N]: ');
      expect(questions[2]).toBe('Continue? [Y/n]: ');
      prompter.close();
    });
  });

  it('reads a secret as a plain line when stdin is not a terminal', async () => {
    const { prompter } = scripted(['  test-secret  ']);

    expect(await prompter.secret('API token')).toBe('test-secret');
    prompter.close();
  });

  it('rejects with PromptCancelledError once closed', async () => {
    const { prompter } = scripted([]);
    prompter.close();

    await expect(prompter.text('Name')).rejects.toBeInstanceOf(PromptCancelledError);
  });
});
