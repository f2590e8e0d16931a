// Largest k for which the number kernel stays exact: n = 2^k, n² = 2^(2k) <= 2^52.
export const MAX_BITS = 26;
export const MAX_SIDE = 2 ** MAX_BITS;

export const DEFAULT_SIDE = 16;
