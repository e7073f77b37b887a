// ---------------------------------------------------------------------------
// Period-over-period change
// ---------------------------------------------------------------------------

/**
 * Calculate percentage change between two values.
 * Going from 0 to something reports ±100 rather than dividing by zero.
 */
export function percentChange(current: number, previous: number): number {
  if (previous === 0) {
    if (current === 0) return 0;
    return current > 0 ? 100 : -100;
  }
  return ((current - previous) / Math.abs(previous)) * 100;
}
