/**
 * Fraction of the pattern's self-energy a window's correlation must reach
 * to count as an occurrence.
 */
export const CORRELATION_THRESHOLD = 0.95;
