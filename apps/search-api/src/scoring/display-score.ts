export interface DisplayCalibrationOptions {
  alpha?: number;
  maxCap?: number;
  epsilon?: number;
}

export const NEUTRAL_DISPLAY_SCORE = 0.5;

/**
 * Per-query display calibration: min-max over the result set, then
 * `1 - exp(-alpha * x)` capped at `maxCap`. Monotonic, so the ranking is
 * unchanged. Flat or single-result sets map to a neutral 0.5.
 */
export function calibrateDisplayScores(
  scores: readonly number[],
  { alpha = 3, maxCap = 0.97, epsilon = 1e-9 }: DisplayCalibrationOptions = {},
): number[] {
  if (scores.length === 0) return [];

  const lo = Math.min(...scores);
  const hi = Math.max(...scores);
  if (hi - lo < epsilon) {
    return scores.map(() => Math.min(maxCap, NEUTRAL_DISPLAY_SCORE));
  }

  return scores.map((score) => {
    const normalized = (score - lo) / (hi - lo + epsilon);
    const squashed = 1 - Math.exp(-alpha * normalized);
    return Math.min(maxCap, Math.max(0, squashed));
  });
}
