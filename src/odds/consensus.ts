/**
 * Odds Consensus Aggregator
 *
 * Averages implied probabilities across bookmakers and finds the best
 * price per team. The mean is a plain arithmetic mean; no vig removal
 * or weighting.
 */

import { InvalidOddsError } from '../errors/index.js';
import type {
  BestPrice,
  ConsensusOdds,
  MatchupConsensus,
  OddsMatchup,
  OddsQuote,
  RejectedQuote,
  TeamConsensus,
} from '../types/odds.js';
import { americanToDecimal, americanToProbability } from './odds-math.js';

interface TeamAccumulator {
  probabilities: number[];
  best: BestPrice;
}

/**
 * Aggregate quotes for one matchup.
 *
 * Teams keep the order of their first quote. Quotes with invalid odds are
 * reported in `rejected` and do not affect the mean. Among equal payouts
 * the first quote wins.
 */
export function aggregateOdds(quotes: readonly OddsQuote[]): ConsensusOdds {
  const byTeam = new Map<string, TeamAccumulator>();
  const rejected: RejectedQuote[] = [];

  for (const quote of quotes) {
    let probability: number;
    let decimalOdds: number;
    try {
      probability = americanToProbability(quote.price);
      decimalOdds = americanToDecimal(quote.price);
    } catch (error) {
      if (error instanceof InvalidOddsError) {
        rejected.push({ quote, reason: error.message });
        continue;
      }
      throw error;
    }

    const candidate: BestPrice = { price: quote.price, bookmaker: quote.bookmaker, decimalOdds };
    const current = byTeam.get(quote.team);
    if (!current) {
      byTeam.set(quote.team, { probabilities: [probability], best: candidate });
      continue;
    }

    current.probabilities.push(probability);
    if (decimalOdds > current.best.decimalOdds) {
      current.best = candidate;
    }
  }

  const teams: TeamConsensus[] = [];
  for (const [team, { probabilities, best }] of byTeam) {
    const total = probabilities.reduce((sum, p) => sum + p, 0);
    teams.push({
      team,
      consensusProbability: total / probabilities.length,
      quoteCount: probabilities.length,
      bestPrice: best,
    });
  }

  return { teams, rejected };
}

export function consensusFor(consensus: ConsensusOdds, team: string): TeamConsensus | null {
  return consensus.teams.find((entry) => entry.team === team) ?? null;
}

/**
 * Consensus for one odds-feed matchup, with both sides picked out.
 */
export function aggregateMatchup(matchup: OddsMatchup): MatchupConsensus {
  const consensus = aggregateOdds(matchup.quotes);
  return {
    matchup,
    consensus,
    away: consensusFor(consensus, matchup.awayTeam),
    home: consensusFor(consensus, matchup.homeTeam),
  };
}
