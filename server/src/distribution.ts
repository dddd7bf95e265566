import type { Distribution, RankedLabel } from "./types";

/* ============================================================================
   Distribution helpers
   ============================================================================ */

export const DISTRIBUTION_TOLERANCE = 1e-6;

export function totalOf(dist: Readonly<Distribution>): number {
  let total = 0;
  for (const value of Object.values(dist)) total += value;
  return total;
}

/**
 * Scales values to sum to 1. Returns `fallback()` when the total is not
 * positive, so callers never divide by zero.
 */
export function normalizeDistribution(
  scores: Readonly<Distribution>,
  fallback: () => Distribution
): Distribution {
  return tryNormalize(scores) ?? fallback();
}

/** `null` when the total is not positive. */
export function tryNormalize(scores: Readonly<Distribution>): Distribution | null {
  const total = totalOf(scores);
  if (!(total > 0) || !Number.isFinite(total)) return null;

  const out: Distribution = {};
  for (const [label, value] of Object.entries(scores)) {
    out[label] = value / total;
  }
  return out;
}

/**
 * Weighted sum over the union of labels. Missing entries count as 0.
 */
export function blendDistributions(
  parts: ReadonlyArray<{ dist: Readonly<Distribution>; weight: number }>
): Distribution {
  const out: Distribution = {};
  for (const { dist, weight } of parts) {
    for (const [label, value] of Object.entries(dist)) {
      out[label] = (out[label] ?? 0) + weight * value;
    }
  }
  return out;
}

/**
 * Descending by probability. Ties go to the lower `tieRank`, then to
 * insertion order.
 */
export function rankDistribution(
  dist: Readonly<Distribution>,
  tieRank: (label: string) => number = () => 0
): RankedLabel[] {
  return Object.entries(dist)
    .map(([name, probability], order) => ({ name, probability, order }))
    .sort(
      (a, b) =>
        b.probability - a.probability ||
        tieRank(a.name) - tieRank(b.name) ||
        a.order - b.order
    )
    .map(({ name, probability }) => ({ name, probability }));
}

export function topLabel(
  dist: Readonly<Distribution>,
  tieRank?: (label: string) => number
): RankedLabel | null {
  return rankDistribution(dist, tieRank)[0] ?? null;
}

export function toDistribution(ranked: readonly RankedLabel[]): Distribution {
  return Object.fromEntries(ranked.map(r => [r.name, r.probability]));
}

export function isNormalized(dist: Readonly<Distribution>): boolean {
  return Math.abs(totalOf(dist) - 1) <= DISTRIBUTION_TOLERANCE;
}
