import { test } from 'node:test';
import assert from 'node:assert/strict';
import { manhattan, isAdjacent } from './vec';

test('manhattan sums the axis distances', () => {
  assert.equal(manhattan({ x: 0, y: 0 }, { x: 3, y: 4 }), 7);
  assert.equal(manhattan({ x: 5, y: 1 }, { x: 2, y: 3 }), 5);
  assert.equal(manhattan({ x: 2, y: 2 }, { x: 2, y: 2 }), 0);
});

test('isAdjacent only accepts unit steps along one axis', () => {
  assert.ok(isAdjacent({ x: 1, y: 1 }, { x: 1, y: 2 }));
  assert.ok(isAdjacent({ x: 1, y: 1 }, { x: 0, y: 1 }));
  assert.ok(!isAdjacent({ x: 1, y: 1 }, { x: 2, y: 2 }));
  assert.ok(!isAdjacent({ x: 1, y: 1 }, { x: 1, y: 1 }));
});
