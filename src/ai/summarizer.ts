/**
 * Summarizer
 *
 * Tries each configured provider in order and returns the first non-empty
 * text. Provider failures are logged and never reach the caller; with no
 * usable text a one-line blurb is built from the numbers alone.
 */

import { getErrorMessage } from '../errors/index.js';
import { createLogger } from '../helpers/logger.js';
import { NO_DATA, formatPercent } from '../markets/signals.js';
import type { Summary, SummaryContext, SummaryProvider } from './types.js';

const log = createLogger('Summarizer');

/**
 * "Minnesota Vikings at Los Angeles Chargers: implied 62%, volume 1,500."
 */
export function fallbackBlurb(context: SummaryContext): string {
  const volume = context.volume === null ? NO_DATA : context.volume.toLocaleString('en-US');
  return `${context.away} at ${context.home}: implied ${formatPercent(context.marketProbability)}, volume ${volume}.`;
}

export class Summarizer {
  constructor(private readonly providers: readonly SummaryProvider[]) {}

  get providerNames(): string[] {
    return this.providers.map((provider) => provider.name);
  }

  async summarize(context: SummaryContext): Promise<Summary> {
    for (const provider of this.providers) {
      try {
        const text = (await provider.summarize(context)).trim();
        if (text) return { text, source: provider.name };
        log.warn(`${provider.name} returned no text`);
      } catch (error) {
        log.warn(`${provider.name} failed: ${getErrorMessage(error)}`);
      }
    }
    return { text: fallbackBlurb(context), source: 'fallback' };
  }
}
