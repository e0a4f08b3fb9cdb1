import assert from 'node:assert/strict';
import test from 'node:test';

import { ensureError } from './ensureError';

void test('ensureError returns Error instances unchanged', () => {
  const error = new RangeError('out of fuel');

  assert.equal(ensureError(error), error);
});

void test('ensureError wraps strings and message-bearing objects', () => {
  assert.equal(ensureError('pit lane closed').message, 'pit lane closed');
  assert.equal(ensureError({ message: 'gearbox' }).message, 'gearbox');
  assert.equal(ensureError({ message: 42 }).message, 'Unknown error');
  assert.equal(ensureError(undefined, 'Race failed').message, 'Race failed');
});

void test('ensureError keeps the original value as the cause', () => {
  const thrown = { code: 'E_FLAG' };

  assert.equal(ensureError(thrown).cause, thrown);
});
