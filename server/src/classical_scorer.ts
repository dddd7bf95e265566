import type { ResolverConfig } from "./config";
import {
  blendDistributions,
  normalizeDistribution,
  rankDistribution,
  toDistribution,
  tryNormalize,
} from "./distribution";
import {
  defaultRegionDistribution,
  regionRank,
  type KnowledgeBase,
  type SurnameClassName,
} from "./knowledge_base";
import type { AncestralInput, ClassicalScore, Distribution } from "./types";

/* ============================================================================
   Signal extractors
   ============================================================================ */

export type SurnameMatch = {
  surnameClass: SurnameClassName | null;
  scores: Distribution;
};

/**
 * First pattern class with a substring hit wins. No hit → default
 * uniform table.
 */
export function analyzeSurname(surname: string, kb: KnowledgeBase): SurnameMatch {
  const lowered = surname.toLowerCase();

  for (const surnameClass of kb.surnameClasses) {
    if (surnameClass.patterns.some(p => lowered.includes(p))) {
      return {
        surnameClass: surnameClass.name,
        scores: { ...surnameClass.weights },
      };
    }
  }

  return { surnameClass: null, scores: defaultRegionDistribution(kb) };
}

/**
 * One point per keyword hit per marker, rescaled to sum 1. Empty when
 * nothing matches.
 */
export function analyzeCulturalMarkers(
  markers: readonly string[],
  kb: KnowledgeBase
): Distribution {
  const scores: Distribution = {};

  for (const marker of markers) {
    const lowered = marker.toLowerCase();
    for (const rule of kb.keywordRules) {
      if (lowered.includes(rule.keyword)) {
        scores[rule.region] = (scores[rule.region] ?? 0) + 1;
      }
    }
  }

  return tryNormalize(scores) ?? {};
}

export function analyzeGeographicHints(
  hints: readonly string[],
  kb: KnowledgeBase
): Distribution {
  const scores: Distribution = {};

  for (const hint of hints) {
    const lowered = hint.toLowerCase();
    for (const [location, weights] of kb.locationWeights) {
      if (!lowered.includes(location)) continue;
      for (const [region, weight] of Object.entries(weights)) {
        scores[region] = (scores[region] ?? 0) + weight;
      }
    }
  }

  return tryNormalize(scores) ?? {};
}

/* ============================================================================
   Baseline
   ============================================================================ */

const TOP_REGIONS = 5;

export function scoreClassical(
  input: AncestralInput,
  kb: KnowledgeBase,
  config: ResolverConfig
): ClassicalScore {
  const weights = config.classicalWeights;

  const combined = blendDistributions([
    { dist: analyzeSurname(input.surname, kb).scores, weight: weights.surname },
    {
      dist: analyzeCulturalMarkers(input.cultural_markers, kb),
      weight: weights.cultural,
    },
    {
      dist: analyzeGeographicHints(input.geographic_hints, kb),
      weight: weights.geographic,
    },
  ]);

  const distribution = normalizeDistribution(combined, () =>
    defaultRegionDistribution(kb)
  );

  const ranked = rankDistribution(distribution, label => regionRank(kb, label));
  const [top] = ranked;

  return {
    distribution: toDistribution(ranked),
    regionalProbabilities: toDistribution(ranked.slice(0, TOP_REGIONS)),
    primaryRegion: top?.name ?? "Unknown",
    confidence: top?.probability ?? 0,
  };
}
