/**
 * Gemini Summary Provider (@google/genai)
 */

import { GoogleGenAI } from '@google/genai';
import { AI } from '../config/api.js';
import { ProviderError, classifyHttpError, getErrorMessage } from '../errors/index.js';
import { SYSTEM_PROMPT, buildPrompt } from './prompt.js';
import type { SummaryContext, SummaryProvider } from './types.js';

/** The slice of the GoogleGenAI client this provider calls */
export interface GeminiClient {
  models: {
    generateContent(params: {
      model: string;
      contents: string;
      config?: { systemInstruction?: string; temperature?: number; maxOutputTokens?: number };
    }): Promise<{ text?: string }>;
  };
}

function statusOf(error: unknown): number | null {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return null;
}

export class GeminiProvider implements SummaryProvider {
  readonly name = 'gemini';

  constructor(
    private readonly client: GeminiClient,
    private readonly model: string
  ) {}

  static fromApiKey(apiKey: string, model: string): GeminiProvider {
    return new GeminiProvider(new GoogleGenAI({ apiKey }), model);
  }

  async summarize(context: SummaryContext): Promise<string> {
    let text: string | undefined;
    try {
      const response = await this.client.models.generateContent({
        model: this.model,
        contents: buildPrompt(context),
        config: {
          systemInstruction: SYSTEM_PROMPT,
          temperature: AI.TEMPERATURE,
          maxOutputTokens: AI.MAX_OUTPUT_TOKENS,
        },
      });
      text = response.text;
    } catch (error) {
      const status = statusOf(error);
      throw new ProviderError('gemini', getErrorMessage(error), status === null ? 'server' : classifyHttpError(status));
    }

    const trimmed = text?.trim() ?? '';
    if (!trimmed) {
      throw new ProviderError('gemini', `Empty response for ${context.away} at ${context.home}`, 'empty');
    }
    return trimmed;
  }
}
