export type StatKind = 'counting' | 'gauge';

export type StatCategory = 'batting' | 'pitching' | 'fielding';

/** Calendar days as YYYY-MM-DD, strictly increasing, one per day. */
export type DateAxis = readonly string[];

/**
 * One stat reading tied to a single game appearance. For counting stats the
 * value is what the player earned that day; for gauge stats it is the
 * cumulative figure the source reported as of that day.
 */
export interface ObservedStatEvent {
  date: string;
  value: number;
}

export interface StatColumn {
  player: string;
  values: readonly number[];
}

export interface TimelineTable {
  statName: string;
  season: number;
  kind: StatKind;
  axis: DateAxis;
  columns: readonly StatColumn[];
}

export type FetchPlayerEvents = (player: string) => Promise<ObservedStatEvent[]>;
