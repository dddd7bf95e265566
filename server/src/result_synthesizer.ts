import type { ResolverConfig } from "./config";
import { SimulationExecutionError } from "./errors";
import { blendDistributions, rankDistribution, toDistribution, tryNormalize } from "./distribution";
import {
  baseDescendantEstimate,
  coastalDepartureFor,
  countryForRegion,
  medicalMarkersFor,
  regionRank,
  resourceLink,
  type KnowledgeBase,
} from "./knowledge_base";
import { charLength } from "./normalize_input";
import type {
  AncestralInput,
  AncestralResult,
  ClassicalScore,
  CulturalResource,
  Distribution,
  PathwayResult,
} from "./types";

const MAX_ETHNIC_GROUPS = 5;
const SECONDARY_REGION_RANKS = { from: 1, to: 4 } as const;

/* ============================================================================
   Enrichment
   ============================================================================ */

export function estimateLivingDescendants(
  region: string,
  surname: string,
  kb: KnowledgeBase,
  config: ResolverConfig
): number {
  const base = baseDescendantEstimate(kb, region);
  const { shortSurnameLength, shortSurnameMultiplier } = config.descendants;

  return charLength(surname) < shortSurnameLength
    ? Math.floor(base * shortSurnameMultiplier)
    : base;
}

export function buildCulturalResources(
  region: string,
  primaryEthnic: string,
  kb: KnowledgeBase
): CulturalResource[] {
  const country = countryForRegion(kb, region);

  return [
    {
      type: "language",
      title: `Learn ${primaryEthnic} Language`,
      description: `Online courses and mobile apps for ${primaryEthnic} language`,
      link: resourceLink(kb, "language", primaryEthnic),
    },
    {
      type: "organization",
      title: `${primaryEthnic} Cultural Association`,
      description: "Connect with cultural practitioners and community",
      link: resourceLink(kb, "orgs", primaryEthnic),
    },
    {
      type: "dna_testing",
      title: "Traditional DNA Testing",
      description: "Confirm inferred origins with lab testing",
      link: resourceLink(kb, "dna-partners"),
    },
    {
      type: "heritage_travel",
      title: `Heritage Tours to ${country}`,
      description: "Guided tours to ancestral regions and cultural sites",
      link: resourceLink(kb, "travel", country),
    },
  ];
}

/* ============================================================================
   Synthesis
   ============================================================================ */

export type SynthesisOutput = {
  result: AncestralResult;
  combined: Distribution;
};

export function synthesizeResult(
  input: AncestralInput,
  classical: ClassicalScore,
  pathway: PathwayResult,
  kb: KnowledgeBase,
  config: ResolverConfig
): SynthesisOutput {
  const byCanonicalOrder = (label: string) => regionRank(kb, label);
  const weights = config.synthesisWeights;

  const combined = tryNormalize(
    blendDistributions([
      { dist: classical.regionalProbabilities, weight: weights.classical },
      { dist: pathway.regionDist, weight: weights.simulator },
    ])
  );
  if (!combined) {
    throw new SimulationExecutionError(
      "Combined region distribution has no mass",
      pathway.backend
    );
  }

  const rankedRegions = rankDistribution(combined, byCanonicalOrder);
  const [primary] = rankedRegions;

  const ethnicGroups = rankDistribution(pathway.ethnicDist).slice(0, MAX_ETHNIC_GROUPS);
  const periodRank = (label: string) => {
    const index = kb.timePeriods.indexOf(label);
    return index === -1 ? kb.timePeriods.length : index;
  };
  const period = rankDistribution(pathway.timeDist, periodRank)[0];

  if (!primary || !period) {
    throw new SimulationExecutionError(
      "Simulator returned an empty region or time distribution",
      pathway.backend
    );
  }

  const primaryEthnic = ethnicGroups[0]?.name ?? "Unknown";

  const result: AncestralResult = {
    primary_region: primary.name,
    confidence_score: primary.probability,
    ethnic_groups: ethnicGroups,
    secondary_regions: rankedRegions.slice(
      SECONDARY_REGION_RANKS.from,
      SECONDARY_REGION_RANKS.to
    ),
    coastal_departure_region: coastalDepartureFor(kb, primary.name),
    estimated_time_period: period.name,
    quantum_coherence_score: Math.min(1, Math.max(0, pathway.coherence)),
    medical_heritage_markers: medicalMarkersFor(kb, primary.name),
    living_descendants_estimate: estimateLivingDescendants(
      primary.name,
      input.surname,
      kb,
      config
    ),
    cultural_reconnection_resources: buildCulturalResources(
      primary.name,
      primaryEthnic,
      kb
    ),
  };

  return { result, combined: toDistribution(rankedRegions) };
}
