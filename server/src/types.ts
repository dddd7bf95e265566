/* ============================================================================
   Core value types
   ============================================================================ */

/**
 * Label → probability. Normalized distributions sum to 1 within 1e-6.
 */
export type Distribution = Record<string, number>;

export interface AncestralInput {
  readonly surname: string;
  readonly given_names: readonly string[];
  readonly cultural_markers: readonly string[];
  readonly geographic_hints: readonly string[];
  readonly historical_period?: string;
  readonly language_patterns: readonly string[];
}

export interface RankedLabel {
  name: string;
  probability: number;
}

export type ResourceType =
  | "language"
  | "organization"
  | "dna_testing"
  | "heritage_travel";

export interface CulturalResource {
  type: ResourceType;
  title: string;
  description: string;
  link: string;
}

export interface AncestralResult {
  primary_region: string;
  confidence_score: number;
  ethnic_groups: RankedLabel[];
  secondary_regions: RankedLabel[];
  coastal_departure_region: string;
  estimated_time_period: string;
  quantum_coherence_score: number;
  medical_heritage_markers: string[];
  living_descendants_estimate: number;
  cultural_reconnection_resources: CulturalResource[];
}

/* ============================================================================
   Pipeline stage outputs
   ============================================================================ */

export interface ClassicalScore {
  /** Full normalized region distribution. */
  distribution: Distribution;
  /** Top 5 of `distribution`, in rank order. */
  regionalProbabilities: Distribution;
  primaryRegion: string;
  confidence: number;
}

export interface PathwayResult {
  backend: "sampling" | "fallback";
  regionDist: Distribution;
  ethnicDist: Distribution;
  timeDist: Distribution;
  coherence: number;
}

/**
 * Sampled outcome → shot count. Keys are bitstrings with the highest qubit
 * first, so character `n - 1 - q` holds qubit `q`.
 */
export type MeasurementCounts = Record<string, number>;
