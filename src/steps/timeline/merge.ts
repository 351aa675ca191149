import _ from 'lodash';
import { errorMessage } from '../../utils';
import { PlayerNotFoundError } from './errors';
import { fillColumn } from './fill';
import { FetchPlayerEvents, StatColumn, TimelineTable } from './types';

/**
 * A merge that has not been committed yet. `table` is what the caller should
 * chart; `base` is what rolling back returns to.
 */
export interface PendingMerge {
  base: TimelineTable;
  table: TimelineTable;
  added: string[];
  skipped: string[];
}

export function hasColumn(table: TimelineTable, player: string): boolean {
  return table.columns.some((column) => column.player === player);
}

export function getColumn(table: TimelineTable, player: string): StatColumn | undefined {
  return table.columns.find((column) => column.player === player);
}

export function missingPlayers(table: TimelineTable, players: readonly string[]): string[] {
  return _.uniq(players).filter((player) => !hasColumn(table, player));
}

/**
 * Fetches and fills a column for every requested player the table lacks.
 * Players already present are left alone, even if their data may have changed
 * upstream; discard the stored table to refresh them. A player that cannot be
 * found, has no games, or whose events cannot be filled is skipped.
 */
export async function stageColumns(
  table: TimelineTable,
  players: readonly string[],
  fetchEvents: FetchPlayerEvents,
): Promise<PendingMerge> {
  const added: StatColumn[] = [];
  const skipped: string[] = [];

  const toAdd = missingPlayers(table, players);
  if (toAdd.length) {
    console.info(`Adding new players: ${toAdd.join(', ')}`);
  }

  for (const player of toAdd) {
    try {
      const events = await fetchEvents(player);
      if (!events.length) {
        console.warn(`Warning: No games found for ${player} in ${table.season}; not adding a column`);
        skipped.push(player);
        continue;
      }
      const { column } = fillColumn(table.axis, player, table.kind, events);
      added.push(column);
    } catch (err) {
      if (err instanceof PlayerNotFoundError) {
        console.warn(`Warning: ${err.message}`);
      } else {
        console.warn(`Warning: Skipping ${player}: ${errorMessage(err)}`);
      }
      skipped.push(player);
    }
  }

  return {
    base: table,
    table: { ...table, columns: [...table.columns, ...added] },
    added: added.map((column) => column.player),
    skipped,
  };
}

export function commitMerge(pending: PendingMerge): TimelineTable {
  return pending.table;
}

export function rollbackMerge(pending: PendingMerge): TimelineTable {
  return pending.base;
}
