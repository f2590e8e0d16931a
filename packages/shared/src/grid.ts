import { MAX_BITS, MAX_SIDE } from './constants';

export function isPowerOfTwo(n: number): boolean {
  if (!Number.isSafeInteger(n) || n < 1) return false;
  // & only sees 32 bits, so reduce large values first
  while (n > 0x40000000) {
    if (n % 2 !== 0) return false;
    n /= 2;
  }
  return (n & (n - 1)) === 0;
}

/** A grid order the number kernel handles exactly: 2^k with k in [0, MAX_BITS]. */
export function isGridOrder(n: number): boolean {
  return isPowerOfTwo(n) && n <= MAX_SIDE;
}

export function assertGridOrder(n: number): void {
  if (!isPowerOfTwo(n)) throw new RangeError(`grid order must be a power of two, got ${n}`);
  if (n > MAX_SIDE) throw new RangeError(`grid order ${n} exceeds 2^${MAX_BITS}`);
}

export function sideFromBits(bits: number): number {
  if (!Number.isInteger(bits) || bits < 0 || bits > MAX_BITS) {
    throw new RangeError(`bits must be an integer in [0, ${MAX_BITS}], got ${bits}`);
  }
  return 2 ** bits;
}

export function bitsOf(n: number): number {
  assertGridOrder(n);
  return Math.round(Math.log2(n));
}

export function inGrid(n: number, x: number, y: number): boolean {
  return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < n && y < n;
}

export function inRange(n: number, d: number): boolean {
  return Number.isInteger(d) && d >= 0 && d < n * n;
}
