// bigint twin of ./hilbert for grid orders past 2^26, where n² no longer fits
// a double exactly. Same contract: no validation, unspecified output on bad input.
import type { BigPt } from '@hilbert/shared';

export function rotateBig(s: bigint, rx: bigint, ry: bigint, x: bigint, y: bigint): readonly [bigint, bigint] {
  if (ry !== 0n) return [x, y] as const;
  if (rx === 1n) {
    x = s - 1n - x;
    y = s - 1n - y;
  }
  return [y, x] as const;
}

export function xyToDBig(n: bigint, x: bigint, y: bigint): bigint {
  let d = 0n;
  for (let s = n / 2n; s > 0n; s /= 2n) {
    const rx = (x & s) > 0n ? 1n : 0n;
    const ry = (y & s) > 0n ? 1n : 0n;
    d += s * s * ((3n * rx) ^ ry);
    [x, y] = rotateBig(s, rx, ry, x, y);
  }
  return d;
}

export function dToXyBig(n: bigint, d: bigint): BigPt {
  let x = 0n, y = 0n;
  let t = d;
  for (let s = 1n; s < n; s *= 2n) {
    const rx = 1n & (t / 2n);
    const ry = 1n & (t ^ rx);
    [x, y] = rotateBig(s, rx, ry, x, y);
    x += s * rx;
    y += s * ry;
    t /= 4n;
  }
  return { x, y };
}
