import fs from 'fs';
import path from 'path';
import type { Pt } from '@hilbert/shared';
import { isAdjacent, inGrid, isGridOrder, isPowerOfTwo } from '@hilbert/shared';
import { HilbertCurve, xyToD, dToXy, xyToDBig, dToXyBig } from '@hilbert/curve';
import { parseBigArg, parseIntArg } from './flags';

export type Kernel = {
  xyToD: (n: number, x: number, y: number) => number;
  dToXy: (n: number, d: number) => Pt;
};

const KERNEL: Kernel = { xyToD, dToXy };

/** Big grids go through the bigint kernel; n itself must still be a safe power of two. */
function bigSide(n: number): bigint | null {
  if (isGridOrder(n)) return null;
  if (!isPowerOfTwo(n)) throw new RangeError(`grid order must be a power of two, got ${n}`);
  return BigInt(n);
}

export function xy2d(n: number, xs: string | undefined, ys: string | undefined): string {
  const big = bigSide(n);
  if (big !== null) {
    const x = parseBigArg(xs, 'x'), y = parseBigArg(ys, 'y');
    if (x < 0n || y < 0n || x >= big || y >= big) throw new RangeError(`point (${x}, ${y}) is outside the ${n}x${n} grid`);
    return xyToDBig(big, x, y).toString();
  }
  return String(new HilbertCurve(n).distance(parseIntArg(xs, 'x'), parseIntArg(ys, 'y')));
}

export function d2xy(n: number, ds: string | undefined): string {
  const big = bigSide(n);
  if (big !== null) {
    const d = parseBigArg(ds, 'd');
    if (d < 0n || d >= big * big) throw new RangeError(`distance ${d} is outside [0, ${big * big - 1n}]`);
    const p = dToXyBig(big, d);
    return `${p.x} ${p.y}`;
  }
  const p = new HilbertCurve(n).point(parseIntArg(ds, 'd'));
  return `${p.x} ${p.y}`;
}

export function pathJson(n: number): string {
  const pts = [...new HilbertCurve(n).points()];
  return JSON.stringify(pts.map(p => [p.x, p.y]));
}

export function writePath(n: number, outPath: string): string {
  const abs = path.resolve(outPath);
  fs.mkdirSync(path.dirname(abs), { recursive: true });
  fs.writeFileSync(abs, pathJson(n) + '\n');
  return abs;
}

/** ASCII picture of the walk, top row is y = n-1. */
export function render(n: number): string[] {
  const pts = [...new HilbertCurve(n).points()];
  const size = 2 * n - 1;
  const rows: string[][] = Array.from({ length: size }, () => new Array<string>(size).fill(' '));
  const row = (y: number) => 2 * (n - 1 - y);

  pts.forEach((p, i) => {
    rows[row(p.y)][2 * p.x] = 'o';
    if (i === 0) return;
    const q = pts[i - 1];
    if (q.y === p.y) rows[row(p.y)][q.x + p.x] = '-';
    else rows[(row(q.y) + row(p.y)) / 2][2 * p.x] = '|';
  });
  return rows.map(r => r.join('').trimEnd());
}

export type CheckReport = { n: number; cells: number; ok: boolean; failures: string[] };

const MAX_FAILURES = 10;

export function check(n: number, kernel: Kernel = KERNEL): CheckReport {
  const curve = new HilbertCurve(n);
  const failures: string[] = [];
  const fail = (msg: string) => { if (failures.length < MAX_FAILURES) failures.push(msg); };

  const seen = new Set<number>();
  let prev: Pt | null = null;
  for (let d = 0; d < curve.cells; d++) {
    const p = kernel.dToXy(n, d);
    if (!inGrid(n, p.x, p.y)) { fail(`d=${d} -> (${p.x}, ${p.y}) off grid`); continue; }
    if (kernel.xyToD(n, p.x, p.y) !== d) fail(`d=${d} -> (${p.x}, ${p.y}) does not map back`);
    if (prev && !isAdjacent(prev, p)) fail(`d=${d - 1} -> d=${d} jumps from (${prev.x}, ${prev.y}) to (${p.x}, ${p.y})`);
    seen.add(p.y * n + p.x);
    prev = p;
  }
  if (seen.size !== curve.cells) fail(`visited ${seen.size} of ${curve.cells} cells`);

  for (let x = 0; x < n; x++) {
    for (let y = 0; y < n; y++) {
      const p = kernel.dToXy(n, kernel.xyToD(n, x, y));
      if (p.x !== x || p.y !== y) fail(`(${x}, ${y}) -> (${p.x}, ${p.y}) after round trip`);
    }
  }
  return { n, cells: curve.cells, ok: failures.length === 0, failures };
}

export function formatCheck(r: CheckReport): string {
  if (r.ok) return `n=${r.n} cells=${r.cells} ok`;
  return [`n=${r.n} cells=${r.cells} FAILED`, ...r.failures.map(f => `  ${f}`)].join('\n');
}
