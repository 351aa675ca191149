import type { ObservedStatEvent } from '../timeline';

export interface ScheduledGame {
  gameId: number;
  date: string;
}

export interface GameStatSource {
  /** Throws PlayerNotFoundError when nobody matches. */
  teamForPlayer(player: string, season: number): Promise<number>;
  /** Regular-season game dates for the team, earliest first. */
  scheduleWindow(season: number, teamId: number): Promise<string[]>;
  eventsForPlayer(player: string, season: number, statName: string): Promise<ObservedStatEvent[]>;
}
