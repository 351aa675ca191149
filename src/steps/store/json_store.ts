import fs from 'node:fs';
import path from 'node:path';
import { asArray, asObject, asString, errorMessage, isIsoDate, readNumber } from '../../utils';
import { StatColumn, StatKind, TimelineTable } from '../timeline';
import { TimelineStore } from './types';

const PROJECT_ROOT = path.resolve(__dirname, '..', '..', '..');
export const DEFAULT_TIMELINE_DIR = process.env.TIMELINE_DATA_DIR ?? path.join(PROJECT_ROOT, 'data', 'timelines');

const FORMAT_VERSION = 1;

export interface StoredTable {
  version: number;
  statName: string;
  season: number;
  kind: StatKind;
  axis: string[];
  columns: { player: string; values: number[] }[];
}

function parseKind(value: unknown): StatKind | undefined {
  return value === 'counting' || value === 'gauge' ? value : undefined;
}

function parseColumn(raw: unknown, length: number): StatColumn | undefined {
  const column = asObject(raw);
  const player = asString(column?.player);
  const values = asArray(column?.values).map(readNumber);
  if (!player || values.length !== length) return undefined;
  const numeric = values.filter((value): value is number => value !== undefined);
  return numeric.length === length ? { player, values: numeric } : undefined;
}

/** Returns the table, or a description of why the payload is not one. */
export function parseStoredTable(raw: unknown): TimelineTable | string {
  const root = asObject(raw);
  if (!root) return 'not an object';
  if (root.version !== FORMAT_VERSION) return `unsupported version ${String(root.version)}`;

  const statName = asString(root.statName);
  const season = readNumber(root.season);
  const kind = parseKind(root.kind);
  if (!statName || season === undefined || !kind) return 'missing stat, season or kind';

  const axis = asArray(root.axis).map(asString);
  const dates = axis.filter((date): date is string => date !== undefined && isIsoDate(date));
  if (!dates.length || dates.length !== axis.length) return 'axis is empty or holds invalid dates';

  const columns: StatColumn[] = [];
  for (const entry of asArray(root.columns)) {
    const column = parseColumn(entry, dates.length);
    if (!column) return 'column does not cover the axis';
    columns.push(column);
  }

  return { statName, season, kind, axis: dates, columns };
}

export function serializeTable(table: TimelineTable): StoredTable {
  return {
    version: FORMAT_VERSION,
    statName: table.statName,
    season: table.season,
    kind: table.kind,
    axis: [...table.axis],
    columns: table.columns.map((column) => ({ player: column.player, values: [...column.values] })),
  };
}

/** One JSON file per (stat, season) under `dir`. Assumes a single writer. */
export class JsonTimelineStore implements TimelineStore {
  constructor(readonly dir: string = DEFAULT_TIMELINE_DIR) {}

  /** Stat keys are reduced to `[A-Za-z0-9_-]` so every file stays directly under `dir`. */
  pathFor(statName: string, season: number): string {
    const key = statName.replace(/[^A-Za-z0-9_-]+/g, '-');
    return path.join(this.dir, `${key}_${season}.json`);
  }

  load(statName: string, season: number): TimelineTable | undefined {
    const filePath = this.pathFor(statName, season);
    if (!fs.existsSync(filePath)) return undefined;

    let parsed: TimelineTable | string;
    try {
      parsed = parseStoredTable(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
    } catch (err) {
      parsed = errorMessage(err);
    }
    if (typeof parsed === 'string') {
      console.warn(`Ignoring stored table at ${filePath}: ${parsed}`);
      return undefined;
    }
    if (parsed.statName !== statName || parsed.season !== season) {
      console.warn(`Ignoring stored table at ${filePath}: it holds ${parsed.statName} for ${parsed.season}`);
      return undefined;
    }
    return parsed;
  }

  save(table: TimelineTable): boolean {
    const filePath = this.pathFor(table.statName, table.season);
    try {
      fs.mkdirSync(this.dir, { recursive: true });
      fs.writeFileSync(filePath, JSON.stringify(serializeTable(table), null, 2));
    } catch (err) {
      console.error(`Failed to save table to ${filePath}: ${errorMessage(err)}`);
      return false;
    }
    console.info(`Table state saved to ${filePath}`);
    return true;
  }

  delete(statName: string, season: number): boolean {
    const filePath = this.pathFor(statName, season);
    if (!fs.existsSync(filePath)) return false;
    fs.rmSync(filePath, { force: true });
    console.info(`Removed ${filePath}`);
    return true;
  }
}
