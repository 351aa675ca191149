import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { JsonTimelineStore } from './store/json_store';
import { TimelineStore } from './store/types';

/** Drops the stored table for (stat, season) so the next run rebuilds it. */
export function cleanTimelines(statName: string, season: number, store: TimelineStore = new JsonTimelineStore()): void {
  if (!store.delete(statName, season)) {
    console.info(`No stored table for ${statName} ${season}; nothing to remove.`);
  }
}

if (require.main === module) {
  const argv = yargs(hideBin(process.argv))
    .option('stat', { type: 'string', demandOption: true, describe: 'Stat key' })
    .option('season', { type: 'number', demandOption: true, describe: 'Season year' })
    .help()
    .parseSync();

  cleanTimelines(argv.stat, argv.season);
}
