import { errorMessage } from '../../utils';

export class EmptyScheduleError extends Error {
  name = 'EmptyScheduleError';

  constructor(readonly season: number, detail: string = 'no scheduled games in the window') {
    super(`Cannot build a date axis for season ${season}: ${detail}`);
  }
}

export class PlayerNotFoundError extends Error {
  name = 'PlayerNotFoundError';

  constructor(readonly player: string, readonly season: number) {
    super(`Player "${player}" not found for season ${season}`);
  }
}

export class PerGameFetchFailure extends Error {
  name = 'PerGameFetchFailure';

  constructor(readonly gameId: number, cause: unknown) {
    super(`Error processing game ${gameId}: ${errorMessage(cause)}`, { cause });
  }
}

export class UnsortedEventsError extends Error {
  name = 'UnsortedEventsError';

  constructor(readonly player: string, readonly index: number) {
    super(`Events for ${player} are not in date order (event ${index} precedes its predecessor)`);
  }
}

/** Not thrown: collected and logged while a column is filled. */
export class EventDateMismatchWarning {
  readonly name = 'EventDateMismatchWarning';
  readonly message: string;

  constructor(readonly player: string, readonly date: string) {
    this.message = `No match found for ${date} for player ${player}`;
  }
}
