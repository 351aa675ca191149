import _ from 'lodash';
import { addDays, daysBetween } from '../../utils';
import { EmptyScheduleError } from './errors';
import { DateAxis } from './types';

/**
 * Expands a schedule's game dates into one entry per calendar day from the
 * earliest game to the latest, inclusive. Off-days are included.
 */
export function buildDateAxis(gameDates: readonly string[], season: number): DateAxis {
  const first = _.min(gameDates);
  const last = _.max(gameDates);
  if (first === undefined || last === undefined) {
    throw new EmptyScheduleError(season);
  }

  const span = daysBetween(first, last);
  return Array.from({ length: span + 1 }, (_unused, offset) => addDays(first, offset));
}

export function axisIndex(axis: DateAxis): Map<string, number> {
  return new Map(axis.map((date, idx) => [date, idx]));
}
