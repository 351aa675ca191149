import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { errorMessage } from '../utils';
import { GameStatSource } from './sources/types';
import { MlbStatsApiSource } from './sources/mlb_stats_api';
import { JsonTimelineStore } from './store/json_store';
import { TimelineStore } from './store/types';
import {
  buildDateAxis,
  commitMerge,
  EmptyScheduleError,
  loadStatCatalog,
  PendingMerge,
  rollbackMerge,
  StatCatalog,
  StatKind,
  stageColumns,
  statKind,
  TimelineTable,
} from './timeline';

export const CURRENT_SEASON = Number(process.env.CURRENT_SEASON ?? new Date().getFullYear());

export interface TimelineRequest {
  statName: string;
  season: number;
  players: string[];
  forceRebuild?: boolean;
}

export interface TimelineDeps {
  source: GameStatSource;
  store: TimelineStore;
  catalog?: StatCatalog;
  currentSeason?: number;
}

async function findScheduleTeam(source: GameStatSource, players: readonly string[], season: number): Promise<number> {
  for (const player of players) {
    try {
      return await source.teamForPlayer(player, season);
    } catch (err) {
      console.warn(`Warning: ${errorMessage(err)}`);
    }
  }
  throw new EmptyScheduleError(season, 'no valid players found in list');
}

/** A table with the season's full axis and no columns yet. */
export async function createTable(
  source: GameStatSource,
  statName: string,
  season: number,
  kind: StatKind,
  players: readonly string[],
): Promise<TimelineTable> {
  const teamId = await findScheduleTeam(source, players, season);
  const dates = await source.scheduleWindow(season, teamId);
  const axis = buildDateAxis(dates, season);
  console.info(`Axis for ${season}: ${axis[0]} → ${axis[axis.length - 1]} (${axis.length} days)`);
  return { statName, season, kind, axis, columns: [] };
}

/**
 * Loads the stored table for (stat, season), or builds a fresh axis when
 * there is none, then stages a column for every requested player the table
 * lacks. Nothing is persisted here; see `finalizeTimeline`.
 */
export async function buildTimeline(request: TimelineRequest, deps: TimelineDeps): Promise<PendingMerge> {
  const { statName, season, players } = request;
  const { source, store } = deps;
  const currentSeason = deps.currentSeason ?? CURRENT_SEASON;

  if (request.forceRebuild || season === currentSeason) {
    const reason = request.forceRebuild ? 'Forcing rebuild' : `Forcing rebuild for current season (${season}) to get latest data`;
    if (store.delete(statName, season)) {
      console.info(`${reason}...`);
    }
  }

  let table = store.load(statName, season);
  if (table) {
    console.info('Loading existing table state...');
  } else {
    console.info('Creating new table...');
    const kind = statKind(statName, deps.catalog ?? loadStatCatalog());
    table = await createTable(source, statName, season, kind, players);
  }

  return stageColumns(table, players, (player) => source.eventsForPlayer(player, season, statName));
}

/** Commits and saves the staged columns when `confirmed`, otherwise rolls them back. */
export function finalizeTimeline(pending: PendingMerge, store: TimelineStore, confirmed: boolean): TimelineTable {
  if (!pending.added.length) {
    console.info('No new players added; table unchanged.');
    return pending.table;
  }

  if (!confirmed) {
    console.info('Table reverted to previous state; new players not saved.');
    return rollbackMerge(pending);
  }

  const table = commitMerge(pending);
  store.save(table);
  return table;
}

if (require.main === module) {
  const argv = yargs(hideBin(process.argv))
    .option('stat', { type: 'string', demandOption: true, describe: 'Stat key, e.g. homeRuns or era' })
    .option('season', { type: 'number', default: CURRENT_SEASON, describe: 'Season year' })
    .option('players', { type: 'array', string: true, demandOption: true, describe: 'Player full names' })
    .option('force-rebuild', { type: 'boolean', default: false, describe: 'Discard the stored table first' })
    .help()
    .parseSync();

  const store = new JsonTimelineStore();
  buildTimeline(
    { statName: argv.stat, season: argv.season, players: argv.players.map(String), forceRebuild: argv['force-rebuild'] },
    { source: new MlbStatsApiSource(), store },
  )
    .then((pending) => {
      finalizeTimeline(pending, store, true);
    })
    .catch((err) => {
      console.error(errorMessage(err));
      process.exitCode = 1;
    });
}
