/**
 * Weighted and load-based candidate selection
 */

/**
 * Cumulative-weight draw. Negative weights count as zero; when every weight
 * is zero the first candidate is returned.
 */
export function weightedSelect<T>(
  candidates: readonly T[],
  weightOf: (candidate: T) => number,
  random: () => number = Math.random,
): T | undefined {
  if (candidates.length === 0) return undefined;

  const weights = candidates.map((candidate) => Math.max(0, weightOf(candidate)));
  const total = weights.reduce((sum, weight) => sum + weight, 0);
  if (total <= 0) return candidates[0];

  let draw = random() * total;
  for (let i = 0; i < candidates.length; i++) {
    const weight = weights[i] ?? 0;
    if (draw < weight) return candidates[i];
    draw -= weight;
  }
  return candidates[candidates.length - 1];
}

export interface LoadSample {
  /** 0-1 */
  successRate: number;
  avgResponseTimeMs: number;
  lastUsedAt: number | null;
}

const RECENCY_WINDOW_MS = 60_000;
const RECENCY_PENALTY = 10;

/**
 * Lower is less loaded. Failure rate dominates, then latency in seconds,
 * then a penalty that fades over a minute after last use.
 */
export function loadScore(sample: LoadSample, now: number): number {
  let recency = 0;
  if (sample.lastUsedAt !== null) {
    const age = now - sample.lastUsedAt;
    if (age < RECENCY_WINDOW_MS) {
      recency = RECENCY_PENALTY * (1 - Math.max(0, age) / RECENCY_WINDOW_MS);
    }
  }
  return (1 - sample.successRate) * 100 + sample.avgResponseTimeMs / 1000 + recency;
}

export function leastLoaded<T>(
  candidates: readonly T[],
  sampleOf: (candidate: T) => LoadSample,
  now: number,
): T | undefined {
  let best: T | undefined;
  let bestScore = Number.POSITIVE_INFINITY;
  for (const candidate of candidates) {
    const score = loadScore(sampleOf(candidate), now);
    if (score < bestScore) {
      best = candidate;
      bestScore = score;
    }
  }
  return best;
}
