import fs from 'node:fs';
import path from 'node:path';
import { asObject, asString, errorMessage, FlatObject, readNumber } from '../../utils';
import { StatCategory, StatKind } from './types';

export interface StatCatalog {
  kinds: Map<string, StatKind>;
  labels: Map<string, string>;
}

export interface StatClassification {
  kind: StatKind;
  category: StatCategory;
}

export interface CategorizedValue {
  value: number;
  category: StatCategory;
  fallback: boolean;
}

export type StatReport = Partial<Record<StatCategory, FlatObject>>;

const PROJECT_ROOT = path.resolve(__dirname, '..', '..', '..');
const CATALOG_PATH = path.join(PROJECT_ROOT, 'stat-kinds.json');
const SCAN_ORDER: StatCategory[] = ['batting', 'pitching', 'fielding'];

let catalogCache: StatCatalog | null = null;

function emptyCatalog(): StatCatalog {
  return { kinds: new Map(), labels: new Map() };
}

export function parseStatCatalog(raw: unknown): StatCatalog {
  const catalog = emptyCatalog();
  const root = asObject(raw);
  if (!root) return catalog;

  (['counting', 'gauge'] as const).forEach((kind) => {
    Object.entries(asObject(root[kind]) ?? {}).forEach(([statName, label]) => {
      catalog.kinds.set(statName, kind);
      const display = asString(label);
      if (display) catalog.labels.set(statName, display);
    });
  });
  return catalog;
}

export function loadStatCatalog(catalogPath: string = CATALOG_PATH): StatCatalog {
  if (catalogCache !== null && catalogPath === CATALOG_PATH) return catalogCache;
  if (!fs.existsSync(catalogPath)) {
    console.warn(`No stat catalog at ${catalogPath}; treating every stat as counting.`);
    return emptyCatalog();
  }

  let catalog: StatCatalog;
  try {
    catalog = parseStatCatalog(JSON.parse(fs.readFileSync(catalogPath, 'utf-8')));
  } catch (err) {
    console.warn(`Failed to parse stat catalog at ${catalogPath}: ${errorMessage(err)}`);
    catalog = emptyCatalog();
  }
  if (catalogPath === CATALOG_PATH) catalogCache = catalog;
  return catalog;
}

export function statKind(statName: string, catalog: StatCatalog = loadStatCatalog()): StatKind {
  return catalog.kinds.get(statName) ?? 'counting';
}

export function statLabel(statName: string, catalog: StatCatalog = loadStatCatalog()): string {
  return catalog.labels.get(statName) ?? statName;
}

export function primaryCategory(position: string | undefined): StatCategory {
  return position === 'P' ? 'pitching' : 'batting';
}

export function classifyStat(
  position: string | undefined,
  statName: string,
  catalog: StatCatalog = loadStatCatalog(),
): StatClassification {
  return { kind: statKind(statName, catalog), category: primaryCategory(position) };
}

/**
 * Reads `statName` from the category the player's position points at. When
 * that category lacks the stat or reports no usable value, every category is
 * scanned and the first present non-zero value wins. For a player who both
 * bats and pitches that can pick the other category's figure, and a genuine
 * zero elsewhere reads as "not found"; the fallback is logged each time.
 */
export function readCategorizedStat(
  report: StatReport,
  position: string | undefined,
  statName: string,
  who: string = 'player',
): CategorizedValue | undefined {
  const category = primaryCategory(position);
  const primary = readNumber(report[category]?.[statName]);
  if (primary !== undefined) {
    return { value: primary, category, fallback: false };
  }

  for (const candidate of SCAN_ORDER) {
    const value = readNumber(report[candidate]?.[statName]);
    if (value !== undefined && value !== 0) {
      console.warn(
        `Warning: "${statName}" missing from ${category} stats for ${who}; using ${candidate} value ${value}`,
      );
      return { value, category: candidate, fallback: true };
    }
  }
  return undefined;
}
