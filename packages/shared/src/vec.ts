import type { Pt } from './types';

export function manhattan(a: Pt, b: Pt) { return Math.abs(a.x - b.x) + Math.abs(a.y - b.y); }
export function isAdjacent(a: Pt, b: Pt) { return manhattan(a, b) === 1; }
