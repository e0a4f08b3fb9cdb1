import assert from 'node:assert/strict';
import test from 'node:test';

import { computePrizeMoney, shareForPosition, sumFees } from './prizes';

void test('computePrizeMoney pays 50/30/20 of the pot to the podium and nothing after', () => {
  assert.deepEqual(computePrizeMoney([1, 2, 3, 4], 800), [400, 240, 160, 0]);
});

void test('computePrizeMoney pays every entry tied first the full winner share by default', () => {
  const prizes = computePrizeMoney([1, 1, 3], 800);

  assert.deepEqual(prizes, [400, 400, 160]);
  assert.equal(sumFees(prizes), 960);
});

void test('computePrizeMoney pools shares across a tie group when splitting', () => {
  assert.deepEqual(computePrizeMoney([1, 1, 3], 800, { tieMode: 'split' }), [320, 320, 160]);
  assert.deepEqual(computePrizeMoney([1, 2, 2, 4], 900, { tieMode: 'split' }), [450, 225, 225, 0]);
  assert.deepEqual(computePrizeMoney([1, 1, 1], 1200, { tieMode: 'split' }), [400, 400, 400]);
});

void test('computePrizeMoney honours a custom split', () => {
  assert.deepEqual(computePrizeMoney([2, 1], 100, { split: [1] }), [0, 100]);
});

void test('shareForPosition returns zero outside the split', () => {
  assert.equal(shareForPosition(1, [0.5, 0.3, 0.2]), 0.5);
  assert.equal(shareForPosition(4, [0.5, 0.3, 0.2]), 0);
});

void test('sumFees totals every entry fee', () => {
  assert.equal(sumFees([400, 400, 400]), 1200);
  assert.equal(sumFees([]), 0);
});
