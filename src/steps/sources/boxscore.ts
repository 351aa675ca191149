import { asObject, asString, normalizeName } from '../../utils';
import { classifyStat, loadStatCatalog, readCategorizedStat, StatCatalog, StatReport } from '../timeline';

export interface BoxscorePlayer {
  fullName: string;
  position?: string;
  /** That game's stat line. */
  game: StatReport;
  /** Season-to-date line as of that game. */
  season: StatReport;
}

function parseReport(raw: unknown): StatReport {
  const report = asObject(raw) ?? {};
  return {
    batting: asObject(report.batting),
    pitching: asObject(report.pitching),
    fielding: asObject(report.fielding),
  };
}

export function parseBoxscorePlayers(raw: unknown): BoxscorePlayer[] {
  const teams = asObject(asObject(raw)?.teams);
  const players: BoxscorePlayer[] = [];

  (['away', 'home'] as const).forEach((side) => {
    const roster = asObject(asObject(teams?.[side])?.players) ?? {};
    Object.values(roster).forEach((entry) => {
      const data = asObject(entry);
      const fullName = asString(asObject(data?.person)?.fullName);
      if (!data || !fullName) return;
      players.push({
        fullName,
        position: asString(asObject(data.position)?.abbreviation),
        game: parseReport(data.stats),
        season: parseReport(data.seasonStats),
      });
    });
  });

  return players;
}

export function findBoxscorePlayer(
  players: readonly BoxscorePlayer[],
  name: string,
): BoxscorePlayer | undefined {
  const wanted = normalizeName(name);
  return players.find((player) => normalizeName(player.fullName) === wanted);
}

/**
 * The value a single boxscore contributes for `player`: the game's own line
 * for counting stats, the season-to-date line for gauge stats. `undefined`
 * when the player is not in the boxscore; 0 when they are but no category
 * carries a usable value.
 */
export function extractPlayerStat(
  boxscore: unknown,
  player: string,
  statName: string,
  catalog: StatCatalog = loadStatCatalog(),
): number | undefined {
  const entry = findBoxscorePlayer(parseBoxscorePlayers(boxscore), player);
  if (!entry) return undefined;

  const { kind } = classifyStat(entry.position, statName, catalog);
  const report = kind === 'counting' ? entry.game : entry.season;
  return readCategorizedStat(report, entry.position, statName, player)?.value ?? 0;
}
