import { integer, primaryKey, real, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const teams = sqliteTable('teams', {
  id: integer('team_id').primaryKey({ autoIncrement: true }),
  name: text('team_name').notNull().unique(),
  budget: real('budget').notNull(),
});

export const cars = sqliteTable('cars', {
  id: integer('car_id').primaryKey({ autoIncrement: true }),
  name: text('car_name').notNull().unique(),
  speed: real('speed').notNull(),
  pitStopInterval: real('pit_stop_interval').notNull(),
  pitStopDuration: real('pit_stop_duration').notNull(),
  teamId: integer('team_id')
    .notNull()
    .references(() => teams.id),
});

export const raceEvents = sqliteTable('race_events', {
  id: integer('race_id').primaryKey({ autoIncrement: true }),
  distance: real('distance').notNull(),
  startedAt: text('started_at').notNull(),
});

export const raceEntries = sqliteTable(
  'race_entries',
  {
    raceId: integer('race_id')
      .notNull()
      .references(() => raceEvents.id),
    teamId: integer('team_id')
      .notNull()
      .references(() => teams.id),
    carId: integer('car_id')
      .notNull()
      .references(() => cars.id),
    timeTaken: real('time_taken').notNull(),
    fee: real('fee').notNull(),
  },
  (table) => [primaryKey({ columns: [table.raceId, table.carId] })],
);

export const raceResults = sqliteTable(
  'race_results',
  {
    raceId: integer('race_id')
      .notNull()
      .references(() => raceEvents.id),
    teamId: integer('team_id')
      .notNull()
      .references(() => teams.id),
    carId: integer('car_id')
      .notNull()
      .references(() => cars.id),
    position: integer('position').notNull(),
    prizeMoney: real('prize_money').notNull(),
  },
  (table) => [primaryKey({ columns: [table.raceId, table.carId] })],
);

export const RALLY_TABLE_NAMES = [
  'teams',
  'cars',
  'race_events',
  'race_entries',
  'race_results',
] as const;

export const rallySchema = { teams, cars, raceEvents, raceEntries, raceResults };
