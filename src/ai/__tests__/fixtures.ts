import type { SummaryContext } from '../types';

export function summaryContext(overrides: Partial<SummaryContext> = {}): SummaryContext {
  return {
    sport: 'NFL',
    away: 'Minnesota Vikings',
    home: 'Los Angeles Chargers',
    marketProbability: 0.62,
    sportsbookProbability: 0.6,
    volume: 1500,
    gameDate: '2025-11-11',
    leaders: [
      {
        team: 'Minnesota Vikings',
        categories: [
          {
            name: 'passingYards',
            displayName: 'Passing Yards',
            leaders: [
              { athlete: 'Away Passer', position: 'QB', displayValue: '180 YDS', value: 180 },
              { athlete: 'Backup Passer', position: 'QB', displayValue: '12 YDS', value: 12 },
            ],
          },
        ],
      },
      { team: 'Los Angeles Chargers', categories: [] },
    ],
    ...overrides,
  };
}
