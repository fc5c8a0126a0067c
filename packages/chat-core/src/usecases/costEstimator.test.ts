import assert from 'node:assert/strict';
import test from 'node:test';

import { ChatCoreError } from '../errors.js';
import {
  DEFAULT_RATE,
  approximateTokenCount,
  estimateCost,
  formatUsd,
  listKnownModels,
  lookupRate,
} from './costEstimator.js';

test('a thousand tokens each way costs the sum of both rates', () => {
  const { rate } = lookupRate('sonar');
  const estimate = estimateCost('sonar', 1000, 1000);

  assert.equal(estimate.amountUsd, rate.input + rate.output);
  assert.equal(estimate.pricingKnown, true);
  assert.equal(estimate.inputTokens, 1000);
  assert.equal(estimate.outputTokens, 1000);
});

test('uses separate input and output rates', () => {
  const estimate = estimateCost('sonar-pro', 2000, 500);

  // 2000 * 0.003 / 1000 + 500 * 0.015 / 1000
  assert.equal(estimate.amountUsd, 0.0135);
});

test('falls back to the flat default rate for unknown models', () => {
  const estimate = estimateCost('unknown-model', 100, 100);

  assert.equal(estimate.amountUsd, 0.0004);
  assert.equal(estimate.pricingKnown, false);
  assert.deepEqual(lookupRate('unknown-model'), { rate: DEFAULT_RATE, known: false });
});

test('model lookup ignores case and surrounding whitespace', () => {
  assert.equal(lookupRate('  Sonar-Pro ').known, true);
});

test('zero tokens cost nothing', () => {
  assert.equal(estimateCost('sonar', 0, 0).amountUsd, 0);
});

test('rejects negative or fractional token counts', () => {
  assert.throws(() => estimateCost('sonar', -1, 0), ChatCoreError);
  assert.throws(() => estimateCost('sonar', 0, 2.5), /outputTokens must be a non-negative integer/);
});

test('estimates are frozen and deterministic', () => {
  const first = estimateCost('mistral-7b-instruct', 1234, 567);
  const second = estimateCost('mistral-7b-instruct', 1234, 567);

  assert.ok(Object.isFrozen(first));
  assert.deepEqual(first, second);
});

test('formatUsd keeps at least four decimals', () => {
  assert.equal(formatUsd(0.002), '$0.0020');
  assert.equal(formatUsd(0.0004, 2), '$0.0004');
  assert.equal(formatUsd(0.000123, 6), '$0.000123');
});

test('lists known models and approximates token counts', () => {
  assert.ok(listKnownModels().includes('sonar'));
  assert.equal(approximateTokenCount(''), 0);
  assert.equal(approximateTokenCount('abcde'), 2);
});
