import { InvalidOddsError } from '../errors/index.js';

function assertValidAmerican(american: number): void {
  if (!Number.isFinite(american) || american === 0) {
    throw new InvalidOddsError(american);
  }
}

/**
 * Implied probability of an American moneyline price.
 *
 * -150 -> 0.6, +200 -> 0.333...
 *
 * @throws InvalidOddsError for 0 or non-finite odds
 */
export function americanToProbability(american: number): number {
  assertValidAmerican(american);
  if (american < 0) {
    const stake = Math.abs(american);
    return stake / (stake + 100);
  }
  return 100 / (american + 100);
}

/**
 * Decimal odds (total return per unit staked). Higher is a better price.
 *
 * @throws InvalidOddsError for 0 or non-finite odds
 */
export function americanToDecimal(american: number): number {
  assertValidAmerican(american);
  return american > 0 ? 1 + american / 100 : 1 + 100 / Math.abs(american);
}

export function formatAmerican(american: number): string {
  return american > 0 ? `+${american}` : `${american}`;
}
