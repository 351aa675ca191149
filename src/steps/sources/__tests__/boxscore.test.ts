import { test } from 'node:test';
import assert from 'node:assert';
import { extractPlayerStat, findBoxscorePlayer, parseBoxscorePlayers } from '../boxscore';
import { parseStatCatalog } from '../../timeline';
import { boxscoreOf } from './fixtures';

const catalog = parseStatCatalog({
  counting: { homeRuns: 'Home Runs', strikeOuts: 'Strikeouts' },
  gauge: { avg: 'Batting Average', era: 'ERA' },
});

const boxscore = boxscoreOf(
  [
    {
      id: 1,
      fullName: 'José Example',
      position: 'SS',
      stats: { batting: { homeRuns: 2, hits: 3 } },
      seasonStats: { batting: { homeRuns: 14, avg: '.301' } },
    },
  ],
  [
    {
      id: 2,
      fullName: 'Sam Starter',
      position: 'P',
      stats: { pitching: { strikeOuts: 8, earnedRuns: 1 } },
      seasonStats: { pitching: { era: '2.84' } },
    },
    {
      id: 3,
      fullName: 'Riley Reliever',
      position: 'P',
      seasonStats: { pitching: { era: '-.--' } },
    },
  ],
);

test('parseBoxscorePlayers reads both sides of the boxscore', () => {
  const players = parseBoxscorePlayers(boxscore);
  assert.deepStrictEqual(
    players.map((player) => [player.fullName, player.position]),
    [
      ['José Example', 'SS'],
      ['Sam Starter', 'P'],
      ['Riley Reliever', 'P'],
    ],
  );
});

test('findBoxscorePlayer matches names without accents or case', () => {
  assert.equal(findBoxscorePlayer(parseBoxscorePlayers(boxscore), ' jose example')?.fullName, 'José Example');
  assert.equal(findBoxscorePlayer(parseBoxscorePlayers(boxscore), 'Jose Exampl'), undefined);
});

test('counting stats come from the game line, gauge stats from the season line', () => {
  assert.equal(extractPlayerStat(boxscore, 'Jose Example', 'homeRuns', catalog), 2);
  assert.equal(extractPlayerStat(boxscore, 'Jose Example', 'avg', catalog), 0.301);
  assert.equal(extractPlayerStat(boxscore, 'Sam Starter', 'strikeOuts', catalog), 8);
  assert.equal(extractPlayerStat(boxscore, 'Sam Starter', 'era', catalog), 2.84);
});

test('a player in the boxscore without a usable value reads as zero', () => {
  assert.equal(extractPlayerStat(boxscore, 'Riley Reliever', 'era', catalog), 0);
  assert.equal(extractPlayerStat(boxscore, 'Sam Starter', 'homeRuns', catalog), 0);
});

test('a player missing from the boxscore yields no reading', () => {
  assert.equal(extractPlayerStat(boxscore, 'Someone Else', 'homeRuns', catalog), undefined);
  assert.equal(extractPlayerStat({ unexpected: true }, 'Sam Starter', 'era', catalog), undefined);
});
