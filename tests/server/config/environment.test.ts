/**
 * Filename: tests/server/config/environment.test.ts
 * Purpose: Ensure environment configuration parsing and validation behave as expected.
 */

import assert from 'node:assert/strict';
import test from 'node:test';

import { parseBooleanFlagValue } from '../../../src/server/config/env-status';
import {
  EnvironmentValidationError,
  __resetEnvironmentCacheForTests,
  getEnvironment,
  parseEnvironment,
} from '../../../src/server/config/environment';

void test('parseEnvironment applies defaults to an empty environment', () => {
  const config = parseEnvironment({}, '/srv/rally');

  assert.deepEqual(config, {
    databaseUrl: 'file:rally.db',
    logging: {
      level: 'info',
      directory: '/srv/rally/logs',
      disableFileLogs: false,
    },
    race: {
      adjustmentFailurePolicy: 'rollback',
      potMode: 'per-entry',
      podiumTieMode: 'full-share',
    },
  });
});

void test('parseEnvironment reads every supported key', () => {
  const config = parseEnvironment(
    {
      DATABASE_URL: ':memory:',
      LOG_LEVEL: 'debug',
      LOG_DIR: 'var/log',
      DISABLE_FILE_LOGS: 'yes',
      RACE_ADJUSTMENT_FAILURE_POLICY: 'log-and-continue',
      RACE_POT_MODE: 'per-team',
      RACE_PODIUM_TIE_MODE: 'split',
    },
    '/srv/rally',
  );

  assert.equal(config.databaseUrl, ':memory:');
  assert.deepEqual(config.logging, {
    level: 'debug',
    directory: '/srv/rally/var/log',
    disableFileLogs: true,
  });
  assert.deepEqual(config.race, {
    adjustmentFailurePolicy: 'log-and-continue',
    potMode: 'per-team',
    podiumTieMode: 'split',
  });
});

void test('parseEnvironment keeps an absolute log directory and treats blanks as unset', () => {
  const config = parseEnvironment(
    { LOG_DIR: '/var/log/rally', LOG_LEVEL: '   ', RACE_POT_MODE: '' },
    '/srv/rally',
  );

  assert.equal(config.logging.directory, '/var/log/rally');
  assert.equal(config.logging.level, 'info');
  assert.equal(config.race.potMode, 'per-entry');
});

void test('parseEnvironment reports each invalid key once', () => {
  assert.throws(
    () =>
      parseEnvironment({
        DATABASE_URL: 'postgres://localhost/rally',
        RACE_POT_MODE: 'per-car',
        DISABLE_FILE_LOGS: 'maybe',
      }),
    (error) => {
      assert.ok(error instanceof EnvironmentValidationError);
      assert.deepEqual(error.issues, [
        { key: 'DATABASE_URL', message: 'DATABASE_URL must be ":memory:" or a "file:" URL.' },
        { key: 'DISABLE_FILE_LOGS', message: 'DISABLE_FILE_LOGS must be set to "true" or "false".' },
        { key: 'RACE_POT_MODE', message: 'RACE_POT_MODE must be one of "per-entry", "per-team".' },
      ]);
      return true;
    },
  );
});

void test('getEnvironment caches the parsed configuration until reset', () => {
  const previous = process.env.RACE_PODIUM_TIE_MODE;
  process.env.RACE_PODIUM_TIE_MODE = 'split';
  __resetEnvironmentCacheForTests();

  try {
    const first = getEnvironment();
    process.env.RACE_PODIUM_TIE_MODE = 'full-share';

    assert.equal(getEnvironment(), first);
    assert.equal(first.race.podiumTieMode, 'split');

    __resetEnvironmentCacheForTests();
    assert.equal(getEnvironment().race.podiumTieMode, 'full-share');
  } finally {
    if (previous === undefined) {
      delete process.env.RACE_PODIUM_TIE_MODE;
    } else {
      process.env.RACE_PODIUM_TIE_MODE = previous;
    }
    __resetEnvironmentCacheForTests();
  }
});

void test('parseBooleanFlagValue accepts common spellings', () => {
  assert.equal(parseBooleanFlagValue(' TRUE '), true);
  assert.equal(parseBooleanFlagValue('off'), false);
  assert.equal(parseBooleanFlagValue('sometimes'), null);
});
