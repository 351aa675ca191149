import { test } from 'node:test';
import assert from 'node:assert';
import path from 'node:path';
import { envValue, isAffirmative, SCENARIOS } from '../pipeline';

test('isAffirmative accepts an empty answer, y and yes', () => {
  assert.deepStrictEqual(
    ['', 'y', ' YES ', 'n', 'no', 'maybe'].map(isAffirmative),
    [true, true, true, false, false, false],
  );
});

test('envValue prefers the scenario override over the process environment', () => {
  const key = 'TIMELINE_TEST_SETTING';
  process.env[key] = 'from-env';
  try {
    assert.equal(envValue({ envOverrides: { [key]: 'from-scenario' } }, key), 'from-scenario');
    assert.equal(envValue({ envOverrides: {} }, key), 'from-env');
  } finally {
    delete process.env[key];
  }
  assert.equal(envValue({ envOverrides: {} }, key), undefined);
});

test('chart:preview keeps its tables and charts under the preview directory', () => {
  const overrides = SCENARIOS['chart:preview'].envOverrides ?? {};
  const previewDir = path.resolve(__dirname, '..', '..', 'data', 'preview');

  assert.equal(overrides.TIMELINE_DATA_DIR, path.join(previewDir, 'timelines'));
  assert.equal(overrides.CHART_OUTPUT_DIR, path.join(previewDir, 'charts'));
  assert.equal(SCENARIOS['chart:cumulative'].envOverrides, undefined);
});
