/**
 * OpenAI Summary Provider
 *
 * Calls Chat Completions directly over fetch.
 */

import { z } from 'zod';
import { AI } from '../config/api.js';
import { ApiError, ProviderError, classifyHttpError, getErrorMessage } from '../errors/index.js';
import { fetchJson } from '../helpers/helpers.js';
import { SYSTEM_PROMPT, buildPrompt } from './prompt.js';
import type { SummaryContext, SummaryProvider } from './types.js';

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).nullish(),
      })
    )
    .default([]),
});

export class OpenAIProvider implements SummaryProvider {
  readonly name = 'openai';

  constructor(
    private readonly apiKey: string,
    private readonly model: string,
    private readonly url: string = AI.OPENAI_API_URL
  ) {}

  async summarize(context: SummaryContext): Promise<string> {
    let body: unknown;
    try {
      body = await fetchJson(this.url, {
        platform: 'openai',
        timeoutMs: AI.TIMEOUT_MS,
        method: 'POST',
        headers: { Authorization: `Bearer ${this.apiKey}` },
        body: {
          model: this.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildPrompt(context) },
          ],
          max_tokens: AI.MAX_OUTPUT_TOKENS,
          temperature: AI.TEMPERATURE,
        },
      });
    } catch (error) {
      const kind = error instanceof ApiError && error.statusCode !== undefined ? classifyHttpError(error.statusCode) : 'server';
      throw new ProviderError('openai', getErrorMessage(error), kind);
    }

    const parsed = ChatCompletionSchema.safeParse(body);
    const content = parsed.success ? (parsed.data.choices[0]?.message?.content ?? '') : '';
    const trimmed = content.trim();
    if (!trimmed) {
      throw new ProviderError('openai', `Empty response for ${context.away} at ${context.home}`, 'empty');
    }
    return trimmed;
  }
}
