/**
 * Probability bands and display helpers for market prices.
 */

export type ProbabilityBand = 'Strong Favorite' | 'Favorite' | 'Toss-Up' | 'Underdog' | 'Long Shot' | 'Unknown';

export interface ProbabilitySignal {
  band: ProbabilityBand;
  description: string;
}

/** Lower bound (percent) of each band, highest first */
const BANDS: ReadonlyArray<{ min: number; band: ProbabilityBand; describe: (pct: string) => string }> = [
  { min: 75, band: 'Strong Favorite', describe: (pct) => `Heavy favorite at ${pct}` },
  { min: 60, band: 'Favorite', describe: (pct) => `Favored to win at ${pct}` },
  { min: 40, band: 'Toss-Up', describe: (pct) => `Close race at ${pct}` },
  { min: 25, band: 'Underdog', describe: (pct) => `Underdog with value at ${pct}` },
  { min: 0, band: 'Long Shot', describe: (pct) => `Upset potential at ${pct}` },
];

export const NO_DATA = '—';

/**
 * Whole-number percentage, or a dash when there is no data.
 */
export function formatPercent(probability: number | null): string {
  return probability === null ? NO_DATA : `${Math.round(probability * 100)}%`;
}

export function classifyProbability(probability: number | null): ProbabilitySignal {
  if (probability === null) {
    return { band: 'Unknown', description: 'No data' };
  }

  const pct = probability * 100;
  const label = formatPercent(probability);
  for (const { min, band, describe } of BANDS) {
    if (pct >= min) return { band, description: describe(label) };
  }
  return { band: 'Long Shot', description: `Upset potential at ${label}` };
}
