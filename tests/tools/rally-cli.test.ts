import assert from 'node:assert/strict';
import { Writable } from 'node:stream';
import test from 'node:test';

import { DEFAULT_RACE_ENGINE_OPTIONS } from '../../src/core/app';
import { createRallyContainer, type RallyContainer } from '../../src/dependencies/rally';
import { USAGE, formatMoney, formatTable, runRallyCli } from '../../tools/rally';
import { InMemoryLogger, createFixedClock } from '../core/race/__fixtures__/inMemoryRaceAdapters';

const createContainer = () =>
  createRallyContainer(
    { databaseUrl: ':memory:', race: DEFAULT_RACE_ENGINE_OPTIONS },
    new InMemoryLogger(),
    createFixedClock(new Date('2025-03-01T09:00:00.000Z')),
  );

const run = async (container: RallyContainer, args: string[]) => {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });

  const { exitCode } = await runRallyCli(args, { services: container, output });
  return { exitCode, lines: chunks.join('').split('\n').slice(0, -1) };
};

const seedTwoTeams = async (container: RallyContainer) => {
  container.ensureSchema();
  await run(container, ['team', 'add', '--name', 'Team A', '--budget', '500']);
  await run(container, ['team', 'add', '--name', 'Team B', '--budget', '1000']);
  await run(container, [
    'car', 'add', '--name', 'A1', '--speed', '200', '--pit-interval', '300', '--pit-duration', '30', '--team', 'Team A',
  ]);
  await run(container, [
    'car', 'add', '--name', 'B1', '--speed', '250', '--pit-interval', '500', '--pit-duration', '20', '--team', 'Team B',
  ]);
};

void test('setup creates the schema once', async () => {
  const container = createContainer();

  assert.deepEqual(await run(container, ['setup']), {
    exitCode: 0,
    lines: ['✅ Rally schema created.'],
  });
  assert.deepEqual(await run(container, ['setup']), {
    exitCode: 0,
    lines: ['✅ Rally schema already in place.'],
  });
  container.close();
});

void test('team and car commands report what they registered', async () => {
  const container = createContainer();
  container.ensureSchema();

  assert.deepEqual(await run(container, ['team', 'add', '--name', 'Turbo Titans', '--budget', '45000']), {
    exitCode: 0,
    lines: ["✅ Team 'Turbo Titans' created successfully with budget 45000."],
  });
  assert.deepEqual(
    await run(container, [
      'car', 'add', '--name', 'Nitro Beast', '--speed', '205', '--pit-interval', '46', '--pit-duration', '11.5',
      '--team', 'Turbo Titans',
    ]),
    { exitCode: 0, lines: ["✅ Car 'Nitro Beast' added successfully to team 'Turbo Titans'."] },
  );
  assert.deepEqual(await run(container, ['team', 'add', '--name', 'Turbo Titans', '--budget', '1']), {
    exitCode: 1,
    lines: ["🚫 Team with name 'Turbo Titans' already exists."],
  });
  assert.deepEqual(
    await run(container, [
      'car', 'add', '--name', 'Ghost', '--speed', '100', '--pit-interval', '10', '--pit-duration', '1',
      '--team', 'Nobody',
    ]),
    { exitCode: 1, lines: ["🚫 No team found with name 'Nobody'."] },
  );
  container.close();
});

void test('race run prints the podium and standings', async () => {
  const container = createContainer();
  await seedTwoTeams(container);

  const result = await run(container, ['race', 'run', '--distance', '1000', '--fee', '400']);

  assert.equal(result.exitCode, 0);
  assert.deepEqual(result.lines, [
    '✅ Race 1 completed successfully.',
    'Race 1: distance 1000, started 2025-03-01T09:00:00.000Z',
    '',
    'Podium',
    '🥇 Team B (B1) - 240.67 min',
    '🥈 Team A (A1) - 301.50 min',
    '',
    'Pos  Team - Car   Time (min)  Prize',
    '1    Team B - B1  240.67      400.00',
    '2    Team A - A1  301.50      240.00',
  ]);

  assert.deepEqual((await run(container, ['team', 'list'])).lines, [
    'Id  Team    Budget',
    '1   Team A  340.00',
    '2   Team B  1000.00',
  ]);
  container.close();
});

void test('race run reports when nobody can afford the fee', async () => {
  const container = createContainer();
  await seedTwoTeams(container);

  assert.deepEqual(await run(container, ['race', 'run', '--distance', '1000', '--fee', '5000']), {
    exitCode: 1,
    lines: ['🚫 No teams with enough budget to join this race (entry fee 5000).'],
  });
  assert.deepEqual(await run(container, ['race', 'run', '--distance', '1000', '--fee=-5']), {
    exitCode: 1,
    lines: ['🚫 Entry fee cannot be negative.'],
  });
  container.close();
});

void test('race show and race list read back stored races', async () => {
  const container = createContainer();
  await seedTwoTeams(container);
  await run(container, ['race', 'run', '--distance', '1000', '--fee', '400']);

  const shown = await run(container, ['race', 'show', '--id', '1']);
  assert.equal(shown.exitCode, 0);
  assert.equal(shown.lines[0], 'Race 1: distance 1000, started 2025-03-01T09:00:00.000Z');

  assert.deepEqual(await run(container, ['race', 'show', '--id', '9']), {
    exitCode: 1,
    lines: ['🚫 No race found with id 9.'],
  });
  assert.deepEqual((await run(container, ['race', 'list'])).lines, [
    'Race  Distance  Started',
    '1     1000      2025-03-01T09:00:00.000Z',
  ]);
  container.close();
});

void test('missing options and unknown commands print usage', async () => {
  const container = createContainer();
  container.ensureSchema();

  assert.deepEqual(await run(container, ['team', 'add', '--budget', '10']), {
    exitCode: 1,
    lines: ['🚫 Missing required option --name.', ...USAGE.split('\n')],
  });
  assert.deepEqual(await run(container, ['fly']), { exitCode: 1, lines: USAGE.split('\n') });
  assert.deepEqual(await run(container, []), { exitCode: 0, lines: USAGE.split('\n') });
  container.close();
});

void test('formatTable pads columns and formatMoney keeps two decimals', () => {
  assert.equal(formatTable(['A', 'Long'], [['xyz', '1']]), 'A    Long\nxyz  1');
  assert.equal(formatMoney(12.5), '12.50');
});
