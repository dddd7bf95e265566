import { describe, expect, it } from "vitest";
import { DEFAULT_RESOLVER_CONFIG } from "./config";
import { SimulationExecutionError } from "./errors";
import { getKnowledgeBase } from "./knowledge_base";
import { createAncestralInput } from "./normalize_input";
import {
  buildCulturalResources,
  estimateLivingDescendants,
  synthesizeResult,
} from "./result_synthesizer";
import type { ClassicalScore, PathwayResult } from "./types";

const kb = getKnowledgeBase();
const config = DEFAULT_RESOLVER_CONFIG;

const classical: ClassicalScore = {
  distribution: { Ghana_Akan: 0.5, Nigeria_Yoruba: 0.3, Nigeria_Igbo: 0.2 },
  regionalProbabilities: { Ghana_Akan: 0.5, Nigeria_Yoruba: 0.3, Nigeria_Igbo: 0.2 },
  primaryRegion: "Ghana_Akan",
  confidence: 0.5,
};

const pathway: PathwayResult = {
  backend: "sampling",
  regionDist: { Nigeria_Yoruba: 0.6, Ghana_Akan: 0.4 },
  ethnicDist: { Yoruba: 0.6, Akan: 0.4 },
  timeDist: { "1801-1850": 0.5, "1751-1800": 0.5 },
  coherence: 1.2,
};

describe("synthesizeResult", () => {
  const { result, combined } = synthesizeResult(
    createAncestralInput({ surname: "Bradley" }),
    classical,
    pathway,
    kb,
    config
  );

  it("blends baseline and simulator regions", () => {
    expect(Object.keys(combined)).toEqual(["Nigeria_Yoruba", "Ghana_Akan", "Nigeria_Igbo"]);
    expect(result.primary_region).toBe("Nigeria_Yoruba");
    expect(result.confidence_score).toBeCloseTo(0.3 * 0.3 + 0.7 * 0.6, 12);
    expect(result.secondary_regions.map(r => r.name)).toEqual(["Ghana_Akan", "Nigeria_Igbo"]);
    expect(result.secondary_regions[0].probability).toBeCloseTo(0.3 * 0.5 + 0.7 * 0.4, 12);
  });

  it("takes ethnic groups and period from the pathway", () => {
    expect(result.ethnic_groups).toEqual([
      { name: "Yoruba", probability: 0.6 },
      { name: "Akan", probability: 0.4 },
    ]);
    expect(result.estimated_time_period).toBe("1751-1800");
    expect(result.quantum_coherence_score).toBe(1);
  });

  it("enriches the primary region from the knowledge base", () => {
    expect(result.coastal_departure_region).toBe("Bight of Benin (Lagos, Badagry)");
    expect(result.medical_heritage_markers).toEqual([
      "G6PD deficiency",
      "Sickle cell common",
      "Hypertension risk",
    ]);
    expect(result.living_descendants_estimate).toBe(25000);
    expect(result.cultural_reconnection_resources.map(r => r.title)).toEqual([
      "Learn Yoruba Language",
      "Yoruba Cultural Association",
      "Traditional DNA Testing",
      "Heritage Tours to Nigeria",
    ]);
  });

  it("fails when nothing carries probability mass", () => {
    const empty: PathwayResult = { ...pathway, backend: "fallback", regionDist: {} };
    const noBaseline: ClassicalScore = { ...classical, regionalProbabilities: {} };

    expect(() =>
      synthesizeResult(createAncestralInput({ surname: "Bradley" }), noBaseline, empty, kb, config)
    ).toThrow(SimulationExecutionError);
  });

  it("fails when the pathway has no time distribution", () => {
    const noTime: PathwayResult = { ...pathway, timeDist: {} };
    expect(() =>
      synthesizeResult(createAncestralInput({ surname: "Bradley" }), classical, noTime, kb, config)
    ).toThrow("Simulator returned an empty region or time distribution");
  });
});

describe("estimateLivingDescendants", () => {
  it("scales the regional base for short surnames", () => {
    expect(estimateLivingDescendants("Ghana_Akan", "Bradley", kb, config)).toBe(15000);
    expect(estimateLivingDescendants("Ghana_Akan", "King", kb, config)).toBe(22500);
    expect(estimateLivingDescendants("Sierra_Leone_Mende", "Hill", kb, config)).toBe(15000);
    expect(estimateLivingDescendants("Gabon_Fang", "Washington", kb, config)).toBe(15000);
  });

  it("measures surname length in characters", () => {
    expect(estimateLivingDescendants("Ghana_Akan", "\u{2000B}".repeat(3), kb, config)).toBe(22500);
    expect(estimateLivingDescendants("Ghana_Akan", "\u{2000B}".repeat(6), kb, config)).toBe(15000);
  });
});

describe("buildCulturalResources", () => {
  it("links language, organization, testing and travel resources", () => {
    expect(buildCulturalResources("Sierra_Leone_Mende", "Mende", kb)).toEqual([
      {
        type: "language",
        title: "Learn Mende Language",
        description: "Online courses and mobile apps for Mende language",
        link: "https://resources.example.org/language/mende",
      },
      {
        type: "organization",
        title: "Mende Cultural Association",
        description: "Connect with cultural practitioners and community",
        link: "https://resources.example.org/orgs/mende",
      },
      {
        type: "dna_testing",
        title: "Traditional DNA Testing",
        description: "Confirm inferred origins with lab testing",
        link: "https://resources.example.org/dna-partners",
      },
      {
        type: "heritage_travel",
        title: "Heritage Tours to Sierra Leone",
        description: "Guided tours to ancestral regions and cultural sites",
        link: "https://resources.example.org/travel/sierra-leone",
      },
    ]);
  });
});
