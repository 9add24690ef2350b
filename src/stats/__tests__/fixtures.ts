/**
 * ESPN scoreboard builders shared by the stats tests
 */

interface GameOptions {
  id?: string;
  away?: string;
  home?: string;
  awayScore?: string;
  homeScore?: string;
  completed?: boolean;
  homeWins?: boolean;
}

const passingLeaders = (athlete: string, value: number) => ({
  name: 'passingYards',
  displayName: 'Passing Yards',
  leaders: [{ displayValue: `${value} YDS`, value, athlete: { displayName: athlete, position: { abbreviation: 'QB' } } }],
});

const sackLeaders = (athlete: string) => ({
  name: 'sacks',
  displayName: 'Sacks',
  leaders: [{ displayValue: '2', athlete: { fullName: athlete } }],
});

export function espnGame(options: GameOptions = {}) {
  const {
    id = '401772900',
    away = 'Minnesota Vikings',
    home = 'Los Angeles Chargers',
    awayScore = '20',
    homeScore = '27',
    completed = true,
    homeWins = true,
  } = options;

  return {
    id,
    name: `${away} at ${home}`,
    date: '2025-11-11T01:15Z',
    status: { type: { completed, state: completed ? 'post' : 'in', description: completed ? 'Final' : 'In Progress' } },
    competitions: [
      {
        competitors: [
          {
            homeAway: 'home',
            score: homeScore,
            winner: homeWins,
            team: { displayName: home, abbreviation: 'LAC' },
            leaders: [passingLeaders('Home Passer', 250), sackLeaders('Home Rusher')],
          },
          {
            homeAway: 'away',
            score: awayScore,
            winner: !homeWins,
            team: { displayName: away, abbreviation: 'MIN' },
            leaders: [passingLeaders('Away Passer', 180)],
          },
        ],
      },
    ],
  };
}
