import { test } from 'node:test';
import assert from 'node:assert';
import path from 'node:path';
import {
  classifyStat,
  loadStatCatalog,
  parseStatCatalog,
  readCategorizedStat,
  statKind,
  statLabel,
} from '..';

const catalog = parseStatCatalog({
  gauge: { era: 'ERA', avg: 'Batting Average' },
  counting: { homeRuns: 'Home Runs' },
});

test('catalog classifies gauge and counting stats, defaulting to counting', () => {
  assert.equal(statKind('era', catalog), 'gauge');
  assert.equal(statKind('homeRuns', catalog), 'counting');
  assert.equal(statKind('triples', catalog), 'counting');
  assert.equal(statLabel('homeRuns', catalog), 'Home Runs');
  assert.equal(statLabel('triples', catalog), 'triples');
});

test('the bundled stat-kinds.json treats era as a gauge and home runs as counting', () => {
  const bundled = loadStatCatalog(path.resolve(__dirname, '..', '..', '..', '..', 'stat-kinds.json'));
  assert.equal(statKind('era', bundled), 'gauge');
  assert.equal(statKind('homeRuns', bundled), 'counting');
  assert.equal(statLabel('era', bundled), 'ERA');
});

test('pitchers read pitching stats, everyone else batting', () => {
  assert.deepStrictEqual(classifyStat('P', 'era', catalog), { kind: 'gauge', category: 'pitching' });
  assert.deepStrictEqual(classifyStat('SS', 'homeRuns', catalog), { kind: 'counting', category: 'batting' });
  assert.deepStrictEqual(classifyStat(undefined, 'avg', catalog), { kind: 'gauge', category: 'batting' });
});

test('the primary category wins, even when its value is zero', () => {
  const read = readCategorizedStat(
    { batting: { homeRuns: 0 }, pitching: { homeRuns: 2 } },
    'RF',
    'homeRuns',
  );
  assert.deepStrictEqual(read, { value: 0, category: 'batting', fallback: false });
});

test('a missing or placeholder primary value falls back to the first non-zero category', () => {
  const twoWay = readCategorizedStat(
    { batting: { homeRuns: 1 }, pitching: { era: '3.00' } },
    'P',
    'homeRuns',
  );
  assert.deepStrictEqual(twoWay, { value: 1, category: 'batting', fallback: true });

  const fallback = readCategorizedStat(
    { batting: { era: 0 }, pitching: {}, fielding: { era: '4.10' } },
    'P',
    'era',
  );
  assert.deepStrictEqual(fallback, { value: 4.1, category: 'fielding', fallback: true });
});

test('nothing usable anywhere reads as undefined', () => {
  assert.equal(readCategorizedStat({ batting: { era: '-.--' }, pitching: { era: null } }, 'P', 'era'), undefined);
  assert.equal(readCategorizedStat({}, 'C', 'homeRuns'), undefined);
});
