#!/usr/bin/env node
import path from 'node:path';
import process from 'node:process';
import readline from 'node:readline/promises';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { errorMessage } from './utils';
import { CURRENT_SEASON } from './steps/01_build_timeline';
import type { PendingMerge, TimelineTable } from './steps/timeline';

type StepAction = (context: PipelineContext) => Promise<void> | void;

interface Step {
  name: string;
  description?: string;
  action: StepAction;
}

interface PipelineContext {
  scenario: string;
  dryRun: boolean;
  statName: string;
  season: number;
  players: string[];
  label?: string;
  assumeYes: boolean;
  forceRebuild: boolean;
  chartDir?: string;
  envOverrides: NodeJS.ProcessEnv;
  pending?: PendingMerge;
  table?: TimelineTable;
}

interface ScenarioDefinition {
  description: string;
  steps: Step[];
  envOverrides?: NodeJS.ProcessEnv;
}

const PROJECT_ROOT = path.resolve(__dirname, '..');
const PREVIEW_DIR = path.join(PROJECT_ROOT, 'data', 'preview');

/** A scenario's override wins over the process environment. */
export function envValue(context: Pick<PipelineContext, 'envOverrides'>, key: string): string | undefined {
  return context.envOverrides[key] ?? process.env[key];
}

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === '' || normalized === 'y' || normalized === 'yes';
}

async function confirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return isAffirmative(await rl.question(question));
  } finally {
    rl.close();
  }
}

async function runPipeline(context: PipelineContext, steps: Step[]): Promise<void> {
  console.info(`Starting pipeline scenario: ${context.scenario}`);
  if (context.dryRun) {
    console.info('Dry-run enabled. Steps will be logged but not executed.');
  }

  for (const step of steps) {
    console.info(`→ Step: ${step.name}`);
    if (step.description) {
      console.info(`   ${step.description}`);
    }

    if (context.dryRun) {
      console.info('   Skipped (dry-run)');
      continue;
    }

    await Promise.resolve(step.action(context));
    console.info('   Completed');
  }

  console.info(`Pipeline scenario "${context.scenario}" finished.`);
}

function requirePlayers(context: PipelineContext): void {
  if (!context.players.length) {
    throw new Error('At least one player is required (--players "First Last" ...).');
  }
}

async function loadStore(context: PipelineContext) {
  const { JsonTimelineStore } = await import('./steps/store/json_store');
  return new JsonTimelineStore(envValue(context, 'TIMELINE_DATA_DIR'));
}

const stepCatalog: Record<string, Step> = {
  cleanTimelines: {
    name: 'Clean stored timeline',
    description: 'Delete the stored table for this stat and season.',
    action: async (context) => {
      const module = await import('./steps/00_clean_timelines');
      module.cleanTimelines(context.statName, context.season, await loadStore(context));
    },
  },
  buildTimeline: {
    name: 'Build timeline',
    description: 'Load or create the table and stage columns for missing players.',
    action: async (context) => {
      requirePlayers(context);
      const module = await import('./steps/01_build_timeline');
      const { MlbStatsApiSource } = await import('./steps/sources/mlb_stats_api');
      context.pending = await module.buildTimeline(
        {
          statName: context.statName,
          season: context.season,
          players: context.players,
          forceRebuild: context.forceRebuild,
        },
        {
          source: new MlbStatsApiSource({ baseUrl: envValue(context, 'MLB_STATS_API_URL') }),
          store: await loadStore(context),
        },
      );
      context.table = context.pending.table;
    },
  },
  renderChart: {
    name: 'Render chart',
    description: 'Draw cumulative lines for the requested players.',
    action: async (context) => {
      if (!context.table) throw new Error('No table to render; run the build step first.');
      const module = await import('./steps/02_render_chart');
      const { statLabel } = await import('./steps/timeline');
      const label = context.label ?? statLabel(context.statName);
      const columns = module.plotColumns(context.table, context.players);
      if (!columns.length) {
        console.warn('No requested players have data; nothing to plot.');
        return;
      }
      const title = module.chartTitle(
        label,
        columns.map((column) => column.player),
        context.table.season,
      );
      new module.SvgChartRenderer(context.chartDir ?? envValue(context, 'CHART_OUTPUT_DIR')).render(
        context.table.axis,
        columns,
        title,
        `${label} (Cumulative)`,
      );
      module.renderFinalValues(context.table, context.players);
    },
  },
  confirmAndSave: {
    name: 'Confirm and save',
    description: 'Persist newly added players, or revert them.',
    action: async (context) => {
      if (!context.pending) throw new Error('Nothing staged; run the build step first.');
      const module = await import('./steps/01_build_timeline');
      const { added } = context.pending;
      const confirmed =
        context.assumeYes ||
        !added.length ||
        (await confirm(`Save data with new players ${added.join(', ')}? (y/n): `));
      context.table = module.finalizeTimeline(context.pending, await loadStore(context), confirmed);
    },
  },
  saveTimeline: {
    name: 'Save timeline',
    description: 'Persist newly added players without asking.',
    action: async (context) => {
      if (!context.pending) throw new Error('Nothing staged; run the build step first.');
      const module = await import('./steps/01_build_timeline');
      context.table = module.finalizeTimeline(context.pending, await loadStore(context), true);
    },
  },
  reportTable: {
    name: 'Report table',
    description: 'Print the final value of every stored column.',
    action: async (context) => {
      const store = await loadStore(context);
      const table = store.load(context.statName, context.season);
      if (!table) {
        console.info(`No stored table for ${context.statName} ${context.season}.`);
        return;
      }
      const module = await import('./steps/02_render_chart');
      module.renderFinalValues(table, context.players.length ? context.players : undefined);
    },
  },
};

export const SCENARIOS: Record<string, ScenarioDefinition> = {
  'chart:cumulative': {
    description: 'Build or extend the table, chart it, then confirm saving new players (default).',
    steps: [stepCatalog.buildTimeline, stepCatalog.renderChart, stepCatalog.confirmAndSave],
  },
  'build:timeline': {
    description: 'Build or extend the table and save it without charting.',
    steps: [stepCatalog.buildTimeline, stepCatalog.saveTimeline],
  },
  'report:table': {
    description: 'Print final values from the stored table.',
    steps: [stepCatalog.reportTable],
  },
  'chart:preview': {
    description: 'Build and chart in a scratch directory, leaving saved tables untouched.',
    steps: [stepCatalog.buildTimeline, stepCatalog.renderChart, stepCatalog.saveTimeline],
    envOverrides: {
      TIMELINE_DATA_DIR: path.join(PREVIEW_DIR, 'timelines'),
      CHART_OUTPUT_DIR: path.join(PREVIEW_DIR, 'charts'),
    },
  },
  'clean:timelines': {
    description: 'Delete the stored table so the next run rebuilds it.',
    steps: [stepCatalog.cleanTimelines],
  },
  'refresh:chart': {
    description: 'Discard the stored table, rebuild, chart and save.',
    steps: [
      stepCatalog.cleanTimelines,
      stepCatalog.buildTimeline,
      stepCatalog.renderChart,
      stepCatalog.confirmAndSave,
    ],
  },
};

function printAvailableScenarios(): void {
  console.info('Available scenarios:');
  Object.entries(SCENARIOS).forEach(([name, definition]) => {
    console.info(`  • ${name.padEnd(22)} ${definition.description}`);
  });
}

async function main(): Promise<void> {
  const parsed = yargs(hideBin(process.argv))
    .option('scenario', {
      alias: 's',
      type: 'string',
      describe: 'Pipeline scenario to run',
      default: process.env.PIPELINE_SCENARIO ?? 'chart:cumulative',
    })
    .option('stat', {
      type: 'string',
      describe: 'Stat key, e.g. homeRuns, hits, era',
      default: process.env.PIPELINE_STAT ?? 'homeRuns',
    })
    .option('season', {
      type: 'number',
      describe: 'Season year',
      default: CURRENT_SEASON,
    })
    .option('players', {
      alias: 'p',
      type: 'array',
      string: true,
      describe: 'Player full names',
    })
    .option('label', {
      type: 'string',
      describe: 'Display name for the stat (defaults to the catalogue label)',
    })
    .option('yes', {
      alias: 'y',
      type: 'boolean',
      describe: 'Save new players without asking',
      default: false,
    })
    .option('force-rebuild', {
      alias: 'f',
      type: 'boolean',
      describe: 'Discard the stored table before building',
      default: false,
    })
    .option('out-dir', {
      type: 'string',
      describe: 'Directory for rendered charts',
    })
    .option('dry-run', {
      alias: 'd',
      type: 'boolean',
      describe: 'Log steps without executing',
      default: process.env.PIPELINE_DRY_RUN === '1',
    })
    .option('list-scenarios', {
      alias: 'l',
      type: 'boolean',
      describe: 'List available scenarios and exit',
      default: false,
    })
    .help()
    .parseSync();

  if (parsed['list-scenarios']) {
    printAvailableScenarios();
    return;
  }

  const scenario = parsed.scenario;
  const scenarioDefinition = SCENARIOS[scenario];
  if (!scenarioDefinition) {
    console.error(`Unknown scenario "${scenario}".`);
    printAvailableScenarios();
    process.exitCode = 1;
    return;
  }
  if (!Number.isInteger(parsed.season)) {
    console.error(`Invalid season "${parsed.season}".`);
    process.exitCode = 1;
    return;
  }

  const context: PipelineContext = {
    scenario,
    dryRun: Boolean(parsed['dry-run']),
    statName: parsed.stat,
    season: parsed.season,
    players: (parsed.players ?? []).map(String),
    label: parsed.label,
    assumeYes: Boolean(parsed.yes),
    forceRebuild: Boolean(parsed['force-rebuild']),
    chartDir: parsed['out-dir'],
    envOverrides: { ...(scenarioDefinition.envOverrides ?? {}) },
  };

  await runPipeline(context, scenarioDefinition.steps);
}

if (require.main === module) {
  main().catch((error) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
  });
}
