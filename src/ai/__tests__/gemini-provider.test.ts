/**
 * Unit tests for the Gemini provider against a fake client
 */

import { ProviderError } from '../../errors/index';
import { GeminiProvider, type GeminiClient } from '../gemini-provider';
import { SYSTEM_PROMPT, buildPrompt } from '../prompt';
import { summaryContext } from './fixtures';

type GenerateParams = Parameters<GeminiClient['models']['generateContent']>;

function fakeClient() {
  const generateContent = jest.fn<Promise<{ text?: string }>, GenerateParams>();
  const client: GeminiClient = { models: { generateContent } };
  return { client, generateContent };
}

describe('GeminiProvider', () => {
  const context = summaryContext();

  it('should send the prompt and return trimmed text', async () => {
    const { client, generateContent } = fakeClient();
    generateContent.mockResolvedValue({ text: '  Vikings visit the Chargers.  ' });

    await expect(new GeminiProvider(client, 'gemini-test').summarize(context)).resolves.toBe(
      'Vikings visit the Chargers.'
    );
    expect(generateContent).toHaveBeenCalledWith({
      model: 'gemini-test',
      contents: buildPrompt(context),
      config: { systemInstruction: SYSTEM_PROMPT, temperature: 0.2, maxOutputTokens: 180 },
    });
  });

  it('should classify client errors by HTTP status', async () => {
    const { client, generateContent } = fakeClient();
    generateContent.mockRejectedValue(Object.assign(new Error('quota exceeded'), { status: 429 }));

    await expect(new GeminiProvider(client, 'gemini-test').summarize(context)).rejects.toMatchObject({
      provider: 'gemini',
      kind: 'rate_limit',
      message: 'quota exceeded',
    });
  });

  it('should treat errors without a status as server failures', async () => {
    const { client, generateContent } = fakeClient();
    generateContent.mockRejectedValue(new Error('socket hang up'));

    await expect(new GeminiProvider(client, 'gemini-test').summarize(context)).rejects.toMatchObject({ kind: 'server' });
  });

  it('should reject empty responses', async () => {
    const { client, generateContent } = fakeClient();
    generateContent.mockResolvedValue({});

    const promise = new GeminiProvider(client, 'gemini-test').summarize(context);

    await expect(promise).rejects.toBeInstanceOf(ProviderError);
    await expect(promise).rejects.toMatchObject({
      kind: 'empty',
      message: 'Empty response for Minnesota Vikings at Los Angeles Chargers',
    });
  });
});
