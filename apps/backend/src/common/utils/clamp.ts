/**
 * Bounds a heuristic output to `[lo, hi]`. NaN collapses to `lo`.
 */
export function clamp(value: number, lo: number, hi: number): number {
  if (Number.isNaN(value)) {
    return lo;
  }
  return Math.min(Math.max(value, lo), hi);
}

export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}
