/**
 * Unit tests for the odds consensus aggregator
 */

import type { OddsMatchup, OddsQuote } from '../../types/odds';
import { aggregateMatchup, aggregateOdds, consensusFor } from '../consensus';

describe('Odds Consensus', () => {
  describe('aggregateOdds', () => {
    const quotes: OddsQuote[] = [
      { bookmaker: 'BookA', team: 'Kansas City Chiefs', price: -150 },
      { bookmaker: 'BookA', team: 'Las Vegas Raiders', price: 130 },
      { bookmaker: 'BookB', team: 'Kansas City Chiefs', price: -140 },
      { bookmaker: 'BookB', team: 'Las Vegas Raiders', price: 0 },
      { bookmaker: 'BookC', team: 'Kansas City Chiefs', price: -160 },
    ];

    it('should average implied probabilities per team', () => {
      const { teams } = aggregateOdds(quotes);
      const chiefs = teams[0];

      expect(teams.map((team) => team.team)).toEqual(['Kansas City Chiefs', 'Las Vegas Raiders']);
      expect(chiefs.quoteCount).toBe(3);
      expect(chiefs.consensusProbability).toBeCloseTo((0.6 + 140 / 240 + 160 / 260) / 3, 10);
    });

    it('should find the best price by payout', () => {
      const chiefs = consensusFor(aggregateOdds(quotes), 'Kansas City Chiefs');

      expect(chiefs?.bestPrice.price).toBe(-140);
      expect(chiefs?.bestPrice.bookmaker).toBe('BookB');
      expect(chiefs?.bestPrice.decimalOdds).toBeCloseTo(1 + 100 / 140, 10);
    });

    it('should reject invalid quotes and leave them out of the mean', () => {
      const result = aggregateOdds(quotes);
      const raiders = consensusFor(result, 'Las Vegas Raiders');

      expect(result.rejected).toEqual([
        { quote: { bookmaker: 'BookB', team: 'Las Vegas Raiders', price: 0 }, reason: 'Invalid American odds: 0' },
      ]);
      expect(raiders?.quoteCount).toBe(1);
      expect(raiders?.consensusProbability).toBeCloseTo(100 / 230, 10);
    });

    it('should keep the first quote on equal payouts', () => {
      const { teams } = aggregateOdds([
        { bookmaker: 'First', team: 'Arsenal', price: -110 },
        { bookmaker: 'Second', team: 'Arsenal', price: -110 },
      ]);

      expect(teams[0].bestPrice.bookmaker).toBe('First');
    });

    it('should return nothing for no quotes', () => {
      expect(aggregateOdds([])).toEqual({ teams: [], rejected: [] });
    });

    it('should drop a team whose quotes are all invalid', () => {
      const result = aggregateOdds([{ bookmaker: 'BookA', team: 'Chelsea', price: 0 }]);

      expect(result.teams).toEqual([]);
      expect(consensusFor(result, 'Chelsea')).toBeNull();
    });
  });

  describe('aggregateMatchup', () => {
    it('should pick out the away and home sides', () => {
      const matchup: OddsMatchup = {
        id: 'evt-1',
        awayTeam: 'Minnesota Vikings',
        homeTeam: 'Los Angeles Chargers',
        commenceTime: '2025-11-11T01:15:00Z',
        quotes: [
          { bookmaker: 'BookA', team: 'Los Angeles Chargers', price: -120 },
          { bookmaker: 'BookA', team: 'Minnesota Vikings', price: 100 },
        ],
      };

      const result = aggregateMatchup(matchup);

      expect(result.matchup).toBe(matchup);
      expect(result.away?.consensusProbability).toBe(0.5);
      expect(result.home?.consensusProbability).toBeCloseTo(120 / 220, 10);
    });
  });
});
