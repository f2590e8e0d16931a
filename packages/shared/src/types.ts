export type Pt = { x: number; y: number };

export type BigPt = { x: bigint; y: bigint };

/** Quadrant bit along one axis at the current scale. */
export type Bit = 0 | 1;
