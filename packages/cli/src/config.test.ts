import test from 'node:test';
import assert from 'node:assert/strict';
import { defaultSide, resolveSide } from './config';

test('defaultSide falls back to 16 without HILBERT_N', () => {
  assert.equal(defaultSide({}), 16);
  assert.equal(defaultSide({ HILBERT_N: '' }), 16);
  assert.equal(defaultSide({ HILBERT_N: '8' }), 8);
});

test('resolveSide prefers --n over the environment', () => {
  assert.equal(resolveSide(['--n', '32'], { HILBERT_N: '8' }), 32);
  assert.equal(resolveSide(['5'], { HILBERT_N: '8' }), 8);
});

test('resolveSide rejects values that are not integers', () => {
  assert.throws(() => resolveSide([], { HILBERT_N: 'big' }), { name: 'RangeError', message: 'HILBERT_N must be an integer, got "big"' });
  assert.throws(() => resolveSide(['--n', 'x'], {}), { name: 'RangeError', message: '--n must be an integer, got "x"' });
});
