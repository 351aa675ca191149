import type { TimelineTable } from '../timeline';

export interface TimelineStore {
  load(statName: string, season: number): TimelineTable | undefined;
  /** False when the table could not be written. */
  save(table: TimelineTable): boolean;
  delete(statName: string, season: number): boolean;
}
