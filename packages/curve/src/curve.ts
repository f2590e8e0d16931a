import type { Pt } from '@hilbert/shared';
import { assertGridOrder, bitsOf, inGrid, inRange, sideFromBits } from '@hilbert/shared';
import { xyToD, dToXy } from './hilbert';

/**
 * Checked view of the curve for one grid order. Validates n once at
 * construction and every point or distance on the way in; the bare kernel in
 * ./hilbert does neither.
 */
export class HilbertCurve {
  readonly n: number;
  readonly bits: number;
  readonly cells: number;

  constructor(n: number) {
    assertGridOrder(n);
    this.n = n;
    this.bits = bitsOf(n);
    this.cells = n * n;
  }

  static ofBits(bits: number): HilbertCurve {
    return new HilbertCurve(sideFromBits(bits));
  }

  distance(x: number, y: number): number {
    if (!inGrid(this.n, x, y)) throw new RangeError(`point (${x}, ${y}) is outside the ${this.n}x${this.n} grid`);
    return xyToD(this.n, x, y);
  }

  point(d: number): Pt {
    if (!inRange(this.n, d)) throw new RangeError(`distance ${d} is outside [0, ${this.cells - 1}]`);
    return dToXy(this.n, d);
  }

  *points(): Generator<Pt> {
    for (let d = 0; d < this.cells; d++) yield dToXy(this.n, d);
  }

  /** Copy of items ordered along the curve; ties keep their input order. */
  sort<T>(items: readonly T[], at: (item: T) => Pt): T[] {
    const keyed = items.map((item, i) => {
      const p = at(item);
      return { item, i, d: this.distance(p.x, p.y) };
    });
    keyed.sort((a, b) => a.d - b.d || a.i - b.i);
    return keyed.map(k => k.item);
  }
}
