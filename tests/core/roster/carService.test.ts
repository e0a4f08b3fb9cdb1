import assert from 'node:assert/strict';
import test from 'node:test';

import { CarService } from '../../../src/core/app';
import {
  InMemoryCarRepository,
  InMemoryLogger,
  InMemoryRallyStore,
  InMemoryTeamRepository,
  seedRoster,
} from '../race/__fixtures__/inMemoryRaceAdapters';

const buildService = async () => {
  const store = new InMemoryRallyStore();
  await seedRoster(store, { teams: [{ name: 'Turbo Titans', budget: 45000, cars: [] }] });
  const logger = new InMemoryLogger();
  const service = new CarService({
    carRepository: new InMemoryCarRepository(store),
    teamRepository: new InMemoryTeamRepository(store),
    logger,
  });
  return { store, logger, service };
};

const nitroBeast = {
  name: 'Nitro Beast',
  speed: 205,
  pitStopInterval: 46,
  pitStopDuration: 11.5,
  teamName: 'Turbo Titans',
};

void test('registerCar attaches the car to the named team', async () => {
  const { service, logger } = await buildService();

  const result = await service.registerCar(nitroBeast);

  assert.deepEqual(result, {
    ok: true,
    car: {
      id: 1,
      name: 'Nitro Beast',
      speed: 205,
      pitStopInterval: 46,
      pitStopDuration: 11.5,
      teamId: 1,
    },
    message: "Car 'Nitro Beast' added successfully to team 'Turbo Titans'.",
  });
  assert.ok(logger.events().includes('roster.car.created'));
});

void test('registerCar reports an unknown team', async () => {
  const { service, store } = await buildService();

  const result = await service.registerCar({ ...nitroBeast, teamName: 'Ghost Crew' });

  assert.deepEqual(result, {
    ok: false,
    reason: 'team-not-found',
    message: "No team found with name 'Ghost Crew'.",
  });
  assert.equal(store.state.cars.length, 0);
});

void test('registerCar rejects a duplicate car name', async () => {
  const { service } = await buildService();
  await service.registerCar(nitroBeast);

  const result = await service.registerCar(nitroBeast);

  assert.deepEqual(result, {
    ok: false,
    reason: 'name-taken',
    message: "Car with name 'Nitro Beast' already exists.",
  });
});

void test('registerCar validates speed, pit interval and pit duration', async () => {
  const { service } = await buildService();

  const result = await service.registerCar({
    ...nitroBeast,
    speed: 0,
    pitStopInterval: -1,
    pitStopDuration: -2,
  });

  assert.equal(result.ok, false);
  if (result.ok || result.reason !== 'invalid-input') {
    assert.fail('expected invalid-input');
  }
  assert.deepEqual(
    result.issues.map((issue) => [issue.path, issue.message]),
    [
      ['speed', 'Speed must be greater than zero.'],
      ['pitStopInterval', 'Pit stop interval must be greater than zero.'],
      ['pitStopDuration', 'Pit stop duration cannot be negative.'],
    ],
  );
});

void test('registerCar accepts a zero pit stop duration', async () => {
  const { service } = await buildService();

  const result = await service.registerCar({ ...nitroBeast, pitStopDuration: 0 });

  assert.equal(result.ok, true);
});

void test('listCars includes the owning team name', async () => {
  const { service } = await buildService();
  await service.registerCar(nitroBeast);

  const cars = await service.listCars();

  assert.deepEqual(
    cars.map((car) => [car.name, car.teamName]),
    [['Nitro Beast', 'Turbo Titans']],
  );
});
