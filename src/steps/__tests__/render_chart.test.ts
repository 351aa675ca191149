import { test } from 'node:test';
import assert from 'node:assert';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  buildChartSvg,
  chartTitle,
  escapeXml,
  fileStem,
  formatFinalValues,
  plotColumns,
  SvgChartRenderer,
} from '../02_render_chart';
import { TimelineTable } from '../timeline';

const table: TimelineTable = {
  statName: 'homeRuns',
  season: 2024,
  kind: 'counting',
  axis: ['2024-04-30', '2024-05-01', '2024-05-02'],
  columns: [
    { player: 'Pat Slugger', values: [0, 1, 2] },
    { player: 'Max Power', values: [1, 1, 1] },
  ],
};

test('chartTitle joins players the way the legend reads', () => {
  assert.equal(chartTitle('Home Runs', ['A', 'B', 'C'], 2024), 'Cumulative Home Runs: A vs. B vs. C (2024)');
});

test('escapeXml escapes markup characters', () => {
  assert.equal(escapeXml('A & B <C> "D"'), 'A &amp; B &lt;C&gt; &quot;D&quot;');
});

test('buildChartSvg draws one polyline per column scaled to the plot area', () => {
  const svg = buildChartSvg(table.axis, table.columns, 'Cumulative Home Runs: Pat & Max (2024)');

  assert.equal(svg.split('<polyline').length - 1, 2);
  assert.ok(svg.includes('points="64,492 422,270 780,48"'));
  assert.ok(svg.includes('>Cumulative Home Runs: Pat &amp; Max (2024)</text>'));
  assert.ok(svg.includes('>May</text>'));
  assert.ok(svg.includes('>2024-04-30</text>'));
});

test('plotColumns keeps request order and drops players without a column', () => {
  const columns = plotColumns(table, ['Max Power', 'Nobody', 'Pat Slugger', 'Max Power']);
  assert.deepStrictEqual(
    columns.map((column) => column.player),
    ['Max Power', 'Pat Slugger'],
  );
});

test('formatFinalValues lays out an aligned text table', () => {
  assert.deepStrictEqual(
    formatFinalValues([
      { player: 'A', values: [0, 1, 1, 3, 3] },
      { player: 'B', values: [0, 0, 2, 2, 2] },
    ]),
    ['player  final  max', '------  -----  ---', 'A       3      3', 'B       2      2'],
  );
});

test('SvgChartRenderer writes the chart under a slug of the title', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'charts-'));
  const outPath = new SvgChartRenderer(dir).render(table.axis, table.columns, 'Cumulative ERA: A vs. B (2025)');

  assert.equal(fileStem('Cumulative ERA: A vs. B (2025)'), 'cumulative-era-a-vs-b-2025');
  assert.equal(outPath, path.join(dir, 'cumulative-era-a-vs-b-2025.svg'));
  assert.ok(fs.readFileSync(outPath, 'utf-8').startsWith('<svg '));
});

test('SvgChartRenderer caps the file name when the title lists many players', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'charts-'));
  const names = Array.from({ length: 12 }, (_unused, idx) => `Christopher Longname${idx}`);
  const columns = names.map((player) => ({ player, values: [0, 1, 2] }));
  const outPath = new SvgChartRenderer(dir).render(table.axis, columns, chartTitle('Home Runs', names, 2024));

  assert.equal(
    outPath,
    path.join(
      dir,
      'cumulative-home-runs-christopher-longname0-vs-christopher-longname1-vs-christopher-longname2-vs.svg',
    ),
  );
  assert.ok(fs.existsSync(outPath));
});

test('fileStem does not end on a separator after cutting', () => {
  assert.equal(fileStem('Cumulative Hits: A vs. B', 16), 'cumulative-hits');
});
