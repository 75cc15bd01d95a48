/**
 * How to read a raw progress value of exactly 1.
 *
 * The service reports progress either as a fraction (0-1) or as a percentage
 * (0-100) and the value 1 is ambiguous between the two. 'fraction' reads it as
 * 100%, 'percent' reads it as 1%.
 */
export type ProgressBoundaryPolicy = 'fraction' | 'percent';

export const DEFAULT_PROGRESS_BOUNDARY: ProgressBoundaryPolicy = 'fraction';

export function normalizeProgress(
  raw: number,
  boundary: ProgressBoundaryPolicy = DEFAULT_PROGRESS_BOUNDARY
): number {
  if (!Number.isFinite(raw)) {
    return 0;
  }
  const upper = boundary === 'fraction' ? raw <= 1 : raw < 1;
  if (raw >= 0 && upper) {
    // two decimals, so 0.1 reads as 10 rather than 10.000000000000002
    return Math.round(raw * 10000) / 100;
  }
  return raw;
}
