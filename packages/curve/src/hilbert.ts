// Discrete Hilbert curve on an n×n grid, n = 2^k.
// (0, 0) is the lower left cell and d = 0; the walk ends at (n-1, 0), d = n²-1.
//
// Neither direction validates its input: n must be a power of two, x and y in
// [0, n-1], d in [0, n²-1]. Anything else yields an unspecified integer, not a
// throw. HilbertCurve (./curve) is the checked entry point.
import type { Bit } from '@hilbert/shared';

/**
 * Maps a quadrant-local point into its parent's frame. Quadrants with ry = 0
 * hold a transposed sub-curve, and the lower right one is also mirrored.
 * Reflection must come before the swap.
 */
export function rotate(s: number, rx: Bit, ry: Bit, x: number, y: number): readonly [number, number] {
  if (ry !== 0) return [x, y] as const;
  if (rx === 1) {
    x = s - 1 - x;
    y = s - 1 - y;
  }
  return [y, x] as const;
}

/** Cell (x, y) to its distance along the curve. Exact for n <= MAX_SIDE. */
export function xyToD(n: number, x: number, y: number): number {
  let d = 0;
  for (let s = Math.trunc(n / 2); s > 0; s = Math.trunc(s / 2)) {
    const rx: Bit = (x & s) > 0 ? 1 : 0;
    const ry: Bit = (y & s) > 0 ? 1 : 0;
    // quadrant order along the curve: (0,0) (0,1) (1,1) (1,0)
    d += s * s * ((3 * rx) ^ ry);
    [x, y] = rotate(s, rx, ry, x, y);
  }
  return d;
}

/** Distance d to its cell. Exact for n <= MAX_SIDE. */
export function dToXy(n: number, d: number): { x: number; y: number } {
  let x = 0, y = 0;
  let t = d;
  for (let s = 1; s < n; s *= 2) {
    // t may exceed 32 bits, so peel its low digits arithmetically
    const rx: Bit = Math.trunc(t / 2) % 2 === 0 ? 0 : 1;
    const lo: Bit = t % 2 === 0 ? 0 : 1;
    const ry: Bit = lo === rx ? 0 : 1;
    [x, y] = rotate(s, rx, ry, x, y);
    x += s * rx;
    y += s * ry;
    t = Math.trunc(t / 4);
  }
  return { x, y };
}
