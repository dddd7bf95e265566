import { formatISO } from "date-fns";
import type { ResolutionTrace } from "./resolver";
import type { AncestralResult } from "./types";

/* ============================================================================
   Types
   ============================================================================ */

export type ConfidenceLevel = "Low" | "Medium" | "High";

export type ResolutionSummary = {
  result: AncestralResult;

  snapshot: {
    primary_region: string;
    confidence_level: ConfidenceLevel;
    coherence_level: ConfidenceLevel;
    backend: ResolutionTrace["backend"];
  };

  region_mix: Array<{
    region: string;
    share: number;
  }>;

  metadata: {
    resolved_at: string;
    signals_used: {
      cultural_markers: number;
      geographic_hints: number;
    };
  };
};

/* ============================================================================
   Helpers
   ============================================================================ */

const percent = (probability: number) =>
  Number((probability * 100).toFixed(1));

/**
 * Coarse tiers for display only; numeric scores stay authoritative.
 */
const levelFromScore = (score: number): ConfidenceLevel =>
  score >= 0.5 ? "High" : score >= 0.25 ? "Medium" : "Low";

/* ============================================================================
   Builder
   ============================================================================ */

export function buildResolutionSummary(
  result: AncestralResult,
  trace: ResolutionTrace,
  signals: { cultural_markers: number; geographic_hints: number },
  resolvedAt: Date = new Date()
): ResolutionSummary {
  const regionMix = Object.entries(trace.combined)
    .slice(0, 5)
    .map(([region, probability]) => ({
      region,
      share: percent(probability),
    }));

  return {
    result,

    snapshot: {
      primary_region: result.primary_region,
      confidence_level: levelFromScore(result.confidence_score),
      coherence_level: levelFromScore(result.quantum_coherence_score),
      backend: trace.backend,
    },

    region_mix: regionMix,

    metadata: {
      resolved_at: formatISO(resolvedAt),
      signals_used: signals,
    },
  };
}

/* ============================================================================
   Text rendering
   ============================================================================ */

export function renderSummaryText(summary: ResolutionSummary): string {
  const { result, snapshot } = summary;

  const lines = [
    `Primary ancestral region: ${result.primary_region} ` +
      `(${percent(result.confidence_score)}% confidence, ${snapshot.confidence_level}).`,
    `Coastal departure: ${result.coastal_departure_region}.`,
    `Estimated period: ${result.estimated_time_period}.`,
  ];

  if (result.ethnic_groups.length > 0) {
    const groups = result.ethnic_groups
      .slice(0, 3)
      .map(g => `${g.name} ${percent(g.probability)}%`)
      .join(", ");
    lines.push(`Ethnic groups: ${groups}.`);
  }

  if (result.secondary_regions.length > 0) {
    lines.push(
      `Also possible: ${result.secondary_regions.map(r => r.name).join(", ")}.`
    );
  }

  lines.push(
    `Estimated living descendants network: ~${result.living_descendants_estimate.toLocaleString("en-US")} people.`
  );

  return lines.join("\n");
}
