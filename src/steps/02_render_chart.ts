import fs from 'node:fs';
import path from 'node:path';
import _ from 'lodash';
import { DateAxis, StatColumn, TimelineTable, getColumn } from './timeline';

export interface ChartRenderer {
  /** Draws one line per column; returns where the chart went. */
  render(axis: DateAxis, columns: readonly StatColumn[], title: string, yLabel?: string): string;
}

const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
export const DEFAULT_CHART_DIR = process.env.CHART_OUTPUT_DIR ?? path.join(PROJECT_ROOT, 'data', 'charts');

const WIDTH = 960;
const HEIGHT = 540;
const PADDING_LEFT = 64;
const PADDING_RIGHT = 180;
const PADDING_TOP = 48;
const PADDING_BOTTOM = 48;
const Y_TICKS_COUNT = 4;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const PALETTE = [
  '#1f77b4',
  '#ff7f0e',
  '#2ca02c',
  '#d62728',
  '#9467bd',
  '#8c564b',
  '#e377c2',
  '#7f7f7f',
  '#bcbd22',
  '#17becf',
];

export function chartTitle(label: string, players: readonly string[], season: number): string {
  return `Cumulative ${label}: ${players.join(' vs. ')} (${season})`;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function monthLabel(date: string): string {
  return MONTHS[Number(date.slice(5, 7)) - 1] ?? date;
}

/**
 * Plots every column against the shared axis. The x scale is linear in days
 * since the axis holds one entry per calendar day.
 */
export function buildChartSvg(
  axis: DateAxis,
  columns: readonly StatColumn[],
  title: string,
  yLabel: string = 'Cumulative',
): string {
  const plotW = WIDTH - PADDING_LEFT - PADDING_RIGHT;
  const plotH = HEIGHT - PADDING_TOP - PADDING_BOTTOM;
  const allValues = columns.flatMap((column) => [...column.values]);
  const yMin = Math.min(0, ...allValues);
  let yMax = Math.max(0, ...allValues);
  if (yMax === yMin) yMax = yMin + 1;

  const xFor = (idx: number) =>
    _.round(PADDING_LEFT + (axis.length <= 1 ? 0 : idx / (axis.length - 1)) * plotW, 2);
  const yFor = (value: number) => _.round(PADDING_TOP + plotH - ((value - yMin) / (yMax - yMin)) * plotH, 2);
  const bottom = PADDING_TOP + plotH;
  const right = PADDING_LEFT + plotW;
  const decimals = yMax - yMin < 10 ? 2 : 0;

  const parts: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}" font-family="sans-serif" font-size="12">`,
    `<rect width="${WIDTH}" height="${HEIGHT}" fill="#ffffff"/>`,
    `<text class="title" x="${PADDING_LEFT}" y="${PADDING_TOP - 20}" font-size="16">${escapeXml(title)}</text>`,
  ];

  for (let tick = 0; tick <= Y_TICKS_COUNT; tick += 1) {
    const value = yMin + ((yMax - yMin) * tick) / Y_TICKS_COUNT;
    const y = yFor(value);
    parts.push(
      `<line x1="${PADDING_LEFT}" y1="${y}" x2="${right}" y2="${y}" stroke="#000000" stroke-opacity="0.3"/>`,
      `<text x="${PADDING_LEFT - 8}" y="${y + 4}" text-anchor="end">${value.toFixed(decimals)}</text>`,
    );
  }

  axis.forEach((date, idx) => {
    if (idx !== 0 && !date.endsWith('-01')) return;
    const x = xFor(idx);
    parts.push(
      `<line x1="${x}" y1="${PADDING_TOP}" x2="${x}" y2="${bottom}" stroke="#000000" stroke-opacity="0.3"/>`,
      `<text x="${x}" y="${bottom + 18}" text-anchor="middle">${idx === 0 ? date : monthLabel(date)}</text>`,
    );
  });

  parts.push(
    `<line x1="${PADDING_LEFT}" y1="${bottom}" x2="${right}" y2="${bottom}" stroke="#000000"/>`,
    `<line x1="${PADDING_LEFT}" y1="${PADDING_TOP}" x2="${PADDING_LEFT}" y2="${bottom}" stroke="#000000"/>`,
    `<text x="${PADDING_LEFT + plotW / 2}" y="${HEIGHT - 8}" text-anchor="middle">Date</text>`,
    `<text transform="translate(16 ${PADDING_TOP + plotH / 2}) rotate(-90)" text-anchor="middle">${escapeXml(yLabel)}</text>`,
  );

  columns.forEach((column, idx) => {
    const color = PALETTE[idx % PALETTE.length];
    const points = column.values.map((value, i) => `${xFor(i)},${yFor(value)}`).join(' ');
    const legendY = PADDING_TOP + idx * 20;
    parts.push(
      `<polyline data-player="${escapeXml(column.player)}" points="${points}" fill="none" stroke="${color}" stroke-width="2"/>`,
      `<line x1="${right + 16}" y1="${legendY}" x2="${right + 36}" y2="${legendY}" stroke="${color}" stroke-width="2"/>`,
      `<text x="${right + 42}" y="${legendY + 4}">${escapeXml(column.player)}</text>`,
    );
  });

  parts.push('</svg>');
  return parts.join('\n');
}

const MAX_STEM_LENGTH = 96;

/** Lowercase slug of `text`, cut to `maxLength` so long player lists still give a valid file name. */
export function fileStem(text: string, maxLength: number = MAX_STEM_LENGTH): string {
  const slug = _.trim(text.toLowerCase().replace(/[^a-z0-9]+/g, '-'), '-');
  return _.trim(slug.slice(0, maxLength), '-') || 'chart';
}

export class SvgChartRenderer implements ChartRenderer {
  constructor(readonly outDir: string = DEFAULT_CHART_DIR) {}

  render(axis: DateAxis, columns: readonly StatColumn[], title: string, yLabel?: string): string {
    const outPath = path.join(this.outDir, `${fileStem(title)}.svg`);
    fs.mkdirSync(this.outDir, { recursive: true });
    fs.writeFileSync(outPath, buildChartSvg(axis, columns, title, yLabel));
    console.info(`Wrote chart for ${columns.length} players -> ${outPath}`);
    return outPath;
  }
}

/** Requested players that have a column, in request order. */
export function plotColumns(table: TimelineTable, players: readonly string[]): StatColumn[] {
  return _.uniq(players)
    .map((player) => getColumn(table, player))
    .filter((column): column is StatColumn => column !== undefined);
}

export function formatFinalValues(columns: readonly StatColumn[], digits: number = 0): string[] {
  const headers = ['player', 'final', 'max'];
  const rows = columns.map((column) => [
    column.player,
    (_.last(column.values) ?? 0).toFixed(digits),
    (_.max(column.values) ?? 0).toFixed(digits),
  ]);

  const allRows = [headers, ...rows];
  const colWidths = headers.map((_header, colIdx) => Math.max(...allRows.map((row) => row[colIdx].length)));
  const divider = colWidths.map((w) => '-'.repeat(w)).join('  ');
  const formatRow = (row: string[]) =>
    row
      .map((cell, idx) => cell.padEnd(colWidths[idx], ' '))
      .join('  ')
      .trimEnd();

  return [formatRow(headers), divider, ...rows.map(formatRow)];
}

export function renderFinalValues(table: TimelineTable, players?: readonly string[]): void {
  const columns = players ? plotColumns(table, players) : [...table.columns];
  if (!columns.length) {
    console.info(`No players stored for ${table.statName} ${table.season}.`);
    return;
  }
  const digits = table.kind === 'gauge' ? 3 : 0;
  formatFinalValues(columns, digits).forEach((line) => console.info(line));
}
