import test, { type TestContext } from 'node:test';
import assert from 'node:assert/strict';
import { main, USAGE } from './cli';

function captured(t: TestContext) {
  const out = t.mock.method(console, 'log', () => {});
  const err = t.mock.method(console, 'error', () => {});
  return {
    out: () => out.mock.calls.map(c => String(c.arguments[0])),
    err: () => err.mock.calls.map(c => String(c.arguments[0])),
  };
}

test('main dispatches conversions by mode', (t) => {
  const io = captured(t);
  assert.equal(main(['xy2d', '2', '0', '--n', '4']), 0);
  assert.equal(main(['d2xy', '14', '--n', '4']), 0);
  assert.deepEqual(io.out(), ['14', '2 0']);
  assert.deepEqual(io.err(), []);
});

test('main prints path, render and check output', (t) => {
  const io = captured(t);
  assert.equal(main(['path', '--n', '2']), 0);
  assert.equal(main(['render', '--n', '2']), 0);
  assert.equal(main(['check', '--n', '8']), 0);
  assert.deepEqual(io.out(), ['[[0,0],[0,1],[1,1],[1,0]]', 'o-o', '| |', 'o o', 'n=8 cells=64 ok']);
});

test('main prints usage and exits 0 without a mode or for help', (t) => {
  const io = captured(t);
  assert.equal(main([]), 0);
  assert.equal(main(['help']), 0);
  assert.equal(main(['--help']), 0);
  assert.deepEqual(io.out(), [USAGE, USAGE, USAGE]);
});

test('main prints usage and exits 1 for an unknown mode', (t) => {
  const io = captured(t);
  assert.equal(main(['bogus']), 1);
  assert.deepEqual(io.out(), [USAGE]);
});

test('main reports errors on stderr with exit code 1', (t) => {
  const io = captured(t);
  assert.equal(main(['xy2d', '9', '0', '--n', '4']), 1);
  assert.equal(main(['render', '--n', '6']), 1);
  assert.deepEqual(io.err(), [
    'error: point (9, 0) is outside the 4x4 grid',
    'error: grid order must be a power of two, got 6',
  ]);
  assert.deepEqual(io.out(), []);
});
