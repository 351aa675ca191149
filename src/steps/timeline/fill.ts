import { EventDateMismatchWarning, UnsortedEventsError } from './errors';
import { axisIndex } from './axis';
import { DateAxis, ObservedStatEvent, StatColumn, StatKind } from './types';

export interface FillResult {
  column: StatColumn;
  skipped: EventDateMismatchWarning[];
}

function assertChronological(player: string, events: readonly ObservedStatEvent[]): void {
  for (let i = 1; i < events.length; i += 1) {
    if (events[i].date < events[i - 1].date) {
      throw new UnsortedEventsError(player, i);
    }
  }
}

function resolveValue(kind: StatKind, running: number, observed: number): number {
  if (kind === 'counting') {
    return running + observed;
  }
  // A zero gauge reading after a real one is a missing report, not a reset.
  if (observed === 0 && running > 0) {
    return running;
  }
  return observed;
}

/**
 * Turns a player's sparse, date-ordered events into a value for every day of
 * the axis. Days without a game carry the last known value forward; days
 * before the first game hold 0. Events dated off the axis are skipped and
 * reported in `skipped`. Duplicate dates are applied in order, so counting
 * values compound.
 */
export function fillColumn(
  axis: DateAxis,
  player: string,
  kind: StatKind,
  events: readonly ObservedStatEvent[],
): FillResult {
  assertChronological(player, events);

  const indexByDate = axisIndex(axis);
  const values = new Array<number>(axis.length);
  const skipped: EventDateMismatchWarning[] = [];
  let lastAssignedIndex = 0;
  let runningValue = 0;

  for (const event of events) {
    const idx = indexByDate.get(event.date);
    if (idx === undefined) {
      const warning = new EventDateMismatchWarning(player, event.date);
      console.warn(`Warning: ${warning.message}`);
      skipped.push(warning);
      continue;
    }

    values.fill(runningValue, lastAssignedIndex, idx);
    runningValue = resolveValue(kind, runningValue, event.value);
    values[idx] = runningValue;
    lastAssignedIndex = idx + 1;
  }

  values.fill(runningValue, lastAssignedIndex);

  return { column: { player, values }, skipped };
}
