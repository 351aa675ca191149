type Stats = Record<string, unknown>;

export interface FakePlayer {
  id: number;
  fullName: string;
  position: string;
  stats?: { batting?: Stats; pitching?: Stats };
  seasonStats?: { batting?: Stats; pitching?: Stats };
}

export function boxscoreOf(away: FakePlayer[], home: FakePlayer[] = []): unknown {
  const side = (players: FakePlayer[]) => ({
    players: Object.fromEntries(
      players.map((player) => [
        `ID${player.id}`,
        {
          person: { id: player.id, fullName: player.fullName },
          position: { abbreviation: player.position },
          stats: { batting: {}, pitching: {}, fielding: {}, ...player.stats },
          seasonStats: { batting: {}, pitching: {}, fielding: {}, ...player.seasonStats },
        },
      ]),
    ),
  });
  return { teams: { away: side(away), home: side(home) } };
}
