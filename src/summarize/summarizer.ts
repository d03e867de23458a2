/**
 * Remark summarizer
 *
 * Turns a day's issue and commit context into one paragraph for the
 * timesheet's Remark column, via an OpenAI-compatible chat completions
 * endpoint (Groq by default). `summarize` never rejects: any failure becomes
 * a fallback remark carrying the error and the start of each context.
 */

import { z } from 'zod';
import { SummarizationError, errorMessage } from '../errors.js';
import { defaultLogger, type Logger } from '../log.js';
import { DEFAULT_POLICY } from '../config/policy.js';
import type { SummarizerCredentials } from '../config/types.js';
import type { CalendarDate } from '../types/timesheet.js';

const DEFAULT_TIMEOUT_MS = 30_000;
const MAX_TOKENS = 150;
const SYSTEM_PROMPT = 'You are a helpful assistant that summarizes work activity for timesheets.';

export const NOT_CONFIGURED_REMARK = 'Summarizer not configured. Raw data gathered.';

export interface Summarizer {
  summarize(issueContext: string, vcsContext: string, date: CalendarDate): Promise<string>;
}

/** The remark used when summarization fails for any reason. */
export function fallbackRemark(
  error: unknown,
  issueContext: string,
  vcsContext: string,
  snippetLength: number = DEFAULT_POLICY.fallbackSnippetLength
): string {
  return (
    `Summarizer error: ${errorMessage(error)}. ` +
    `Raw data: ${issueContext.slice(0, snippetLength)}... ${vcsContext.slice(0, snippetLength)}...`
  );
}

export function buildPrompt(issueContext: string, vcsContext: string, date: CalendarDate): string {
  return [
    `Create a concise daily timesheet summary for the following activities on ${date}.`,
    '',
    'Jira Activity:',
    issueContext || '(none)',
    '',
    'GitHub Activity:',
    vcsContext || '(none)',
    '',
    'Format the output as a single paragraph describing the work done.',
  ].join('\n');
}

// ─── Chat Completions ────────────────────────────────────────

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }),
      })
    )
    .min(1),
});

export interface ChatCompletionSummarizerOptions {
  apiKey: string;
  model: string;
  baseUrl: string;
  snippetLength?: number;
  timeoutMs?: number;
  logger?: Logger;
}

export class ChatCompletionSummarizer implements Summarizer {
  private readonly endpoint: string;
  private readonly snippetLength: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: ChatCompletionSummarizerOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    this.snippetLength = options.snippetLength ?? DEFAULT_POLICY.fallbackSnippetLength;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? defaultLogger;
  }

  async summarize(issueContext: string, vcsContext: string, date: CalendarDate): Promise<string> {
    try {
      return await this.complete(buildPrompt(issueContext, vcsContext, date));
    } catch (err) {
      this.logger.warn(`Summarizer failed for ${date}: ${errorMessage(err)}`);
      return fallbackRemark(err, issueContext, vcsContext, this.snippetLength);
    }
  }

  private async complete(prompt: string): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(this.endpoint, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.options.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: prompt },
          ],
          max_tokens: MAX_TOKENS,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new SummarizationError(
          `Summarizer API error: ${response.status} ${response.statusText}`
        );
      }

      const parsed = CompletionSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new SummarizationError('Summarizer returned an unexpected response', {
          cause: parsed.error,
        });
      }

      const content = parsed.data.choices[0]?.message.content?.trim() ?? '';
      if (!content) {
        throw new SummarizationError('Summarizer returned an empty completion');
      }
      return content;
    } finally {
      clearTimeout(timeout);
    }
  }
}

/** Used when no API key is configured. */
export class UnconfiguredSummarizer implements Summarizer {
  summarize(): Promise<string> {
    return Promise.resolve(NOT_CONFIGURED_REMARK);
  }
}

export function createSummarizer(
  credentials: Required<SummarizerCredentials> | null,
  options: { snippetLength?: number; logger?: Logger } = {}
): Summarizer {
  if (!credentials) return new UnconfiguredSummarizer();
  return new ChatCompletionSummarizer({ ...credentials, ...options });
}
