export const DECAY_HALF_LIFE_DAYS = 14;

/** Six half-lives; older evidence counts for nothing. */
export const MAX_PATTERN_AGE_DAYS = 84;

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Exponential decay between 1 (just now) and 0 (older than the max age). */
export function decayFactor(timestamp: number, now: number): number {
  const ageDays = Math.max(0, now - timestamp) / MS_PER_DAY;
  if (ageDays >= MAX_PATTERN_AGE_DAYS) {
    return 0;
  }
  return 0.5 ** (ageDays / DECAY_HALF_LIFE_DAYS);
}

export function decayedConfidence(baseConfidence: number, lastOccurrence: number, now: number): number {
  const base = Math.min(1, Math.max(0, baseConfidence));
  return base * decayFactor(lastOccurrence, now);
}
