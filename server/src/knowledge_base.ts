/**
 * knowledge_base.ts
 *
 * Read-only reference tables behind every resolution. The raw data is
 * validated once, indexed, and deep-frozen; concurrent resolutions share
 * the result without synchronization.
 */

import { z } from "zod";
import knowledgeBaseData from "../data/knowledge_base.json";
import { deepFreeze } from "./config";
import { KnowledgeBaseError } from "./errors";
import type { Distribution } from "./types";

/* ============================================================================
   Raw schema
   ============================================================================ */

const weightTable = z.record(z.string(), z.number().nonnegative());

const KnowledgeBaseSchema = z.object({
  regions: z
    .array(
      z.object({
        label: z.string().min(1),
        country: z.string().min(1),
        ethnic_group: z.string().min(1),
      })
    )
    .min(1),
  ethnic_groups: z.array(z.string().min(1)).min(1),
  time_periods: z.array(z.string().min(1)).min(1),
  default_regions: z.array(z.string().min(1)).min(1),
  surname_classes: z.array(
    z.object({
      name: z.enum([
        "plantation_assigned",
        "anglicized_african",
        "occupational",
        "geographic",
      ]),
      patterns: z.array(z.string().min(1)),
      // null → the default uniform table
      weights: weightTable.nullable(),
    })
  ),
  regional_markers: z.record(
    z.string(),
    z.object({
      cultural: z.array(z.string().min(1)),
      linguistic: z.array(z.string().min(1)),
      food: z.array(z.string().min(1)),
    })
  ),
  us_location_weights: z.record(z.string(), weightTable),
  medical_markers: z.record(z.string(), z.array(z.string())),
  default_medical_marker: z.string(),
  medical_recommendations: z.array(z.string()),
  medical_research_resources: z.array(z.string()),
  coastal_departures: z.record(z.string(), z.string()),
  default_coastal_departure: z.string(),
  descendant_estimates: z.record(z.string(), z.number().int().positive()),
  default_descendant_estimate: z.number().int().positive(),
  fallback_ethnic_pool: z.array(z.string().min(1)),
  fallback_time_distribution: weightTable,
  resource_base_url: z.string().url(),
  language_providers: z.array(z.string()),
  travel_providers: z.array(z.string()),
});

export type KnowledgeBaseData = z.infer<typeof KnowledgeBaseSchema>;

/* ============================================================================
   Indexed tables
   ============================================================================ */

export type SurnameClassName = KnowledgeBaseData["surname_classes"][number]["name"];

export type RegionRecord = {
  readonly label: string;
  readonly country: string;
  readonly ethnicGroup: string;
  /** Position in the canonical region ordering. */
  readonly index: number;
};

export type SurnameClass = {
  readonly name: SurnameClassName;
  /** Lowercased patterns. */
  readonly patterns: readonly string[];
  readonly weights: Readonly<Distribution>;
};

export type KeywordRule = {
  /** Lowercased keyword. */
  readonly keyword: string;
  readonly region: string;
};

export type KnowledgeBase = {
  readonly regions: readonly RegionRecord[];
  readonly ethnicGroups: readonly string[];
  readonly timePeriods: readonly string[];
  readonly defaultRegions: readonly string[];
  readonly surnameClasses: readonly SurnameClass[];
  readonly keywordRules: readonly KeywordRule[];
  readonly locationWeights: ReadonlyMap<string, Readonly<Distribution>>;
  readonly medicalMarkers: ReadonlyMap<string, readonly string[]>;
  readonly defaultMedicalMarker: string;
  readonly medicalRecommendations: readonly string[];
  readonly medicalResearchResources: readonly string[];
  readonly coastalDepartures: ReadonlyMap<string, string>;
  readonly defaultCoastalDeparture: string;
  readonly descendantEstimates: ReadonlyMap<string, number>;
  readonly defaultDescendantEstimate: number;
  readonly fallbackEthnicPool: readonly string[];
  readonly fallbackTimeDistribution: Readonly<Distribution>;
  readonly resourceBaseUrl: string;
  readonly languageProviders: readonly string[];
  readonly travelProviders: readonly string[];
  readonly regionsByLabel: ReadonlyMap<string, RegionRecord>;
};

function uniformOver(labels: readonly string[]): Distribution {
  const share = 1 / labels.length;
  return Object.fromEntries(labels.map(label => [label, share]));
}

function buildKnowledgeBase(data: KnowledgeBaseData): KnowledgeBase {
  const regions: RegionRecord[] = data.regions.map((r, index) => ({
    label: r.label,
    country: r.country,
    ethnicGroup: r.ethnic_group,
    index,
  }));
  const regionsByLabel = new Map(regions.map(r => [r.label, r]));

  if (regionsByLabel.size !== regions.length) {
    throw new KnowledgeBaseError("Region labels must be unique.");
  }

  const unknown = data.default_regions.filter(l => !regionsByLabel.has(l));
  if (unknown.length > 0) {
    throw new KnowledgeBaseError(
      `Default regions missing from region table: ${unknown.join(", ")}`
    );
  }

  const defaultDistribution = uniformOver(data.default_regions);

  const surnameClasses: SurnameClass[] = data.surname_classes.map(c => ({
    name: c.name,
    patterns: c.patterns.map(p => p.toLowerCase()),
    weights: c.weights ?? defaultDistribution,
  }));

  const keywordRules: KeywordRule[] = [];
  for (const [region, markers] of Object.entries(data.regional_markers)) {
    for (const keyword of [
      ...markers.cultural,
      ...markers.linguistic,
      ...markers.food,
    ]) {
      keywordRules.push({ keyword: keyword.toLowerCase(), region });
    }
  }

  const locationWeights = new Map(
    Object.entries(data.us_location_weights).map(([location, weights]) => [
      location.toLowerCase(),
      weights,
    ])
  );

  return {
    regions,
    ethnicGroups: data.ethnic_groups,
    timePeriods: data.time_periods,
    defaultRegions: data.default_regions,
    surnameClasses,
    keywordRules,
    locationWeights,
    medicalMarkers: new Map(Object.entries(data.medical_markers)),
    defaultMedicalMarker: data.default_medical_marker,
    medicalRecommendations: data.medical_recommendations,
    medicalResearchResources: data.medical_research_resources,
    coastalDepartures: new Map(Object.entries(data.coastal_departures)),
    defaultCoastalDeparture: data.default_coastal_departure,
    descendantEstimates: new Map(Object.entries(data.descendant_estimates)),
    defaultDescendantEstimate: data.default_descendant_estimate,
    fallbackEthnicPool: data.fallback_ethnic_pool,
    fallbackTimeDistribution: data.fallback_time_distribution,
    resourceBaseUrl: data.resource_base_url.replace(/\/+$/, ""),
    languageProviders: data.language_providers,
    travelProviders: data.travel_providers,
    regionsByLabel,
  };
}

/* ============================================================================
   Public API
   ============================================================================ */

/**
 * Validates and indexes reference data. Defaults to the bundled tables;
 * tests may pass fixtures.
 */
export function loadKnowledgeBase(raw: unknown = knowledgeBaseData): KnowledgeBase {
  const parsed = KnowledgeBaseSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "(root)";
    throw new KnowledgeBaseError(
      `Invalid knowledge base at ${where}: ${issue?.message ?? "unknown issue"}`
    );
  }

  return deepFreeze(buildKnowledgeBase(parsed.data));
}

let sharedKnowledgeBase: KnowledgeBase | null = null;

/** Process-wide bundled tables, loaded on first use. */
export function getKnowledgeBase(): KnowledgeBase {
  if (!sharedKnowledgeBase) {
    sharedKnowledgeBase = loadKnowledgeBase();
  }
  return sharedKnowledgeBase;
}

/* ============================================================================
   Accessors
   ============================================================================ */

export function defaultRegionDistribution(kb: KnowledgeBase): Distribution {
  return uniformOver(kb.defaultRegions);
}

/** Canonical position; labels outside the table sort after it. */
export function regionRank(kb: KnowledgeBase, label: string): number {
  return kb.regionsByLabel.get(label)?.index ?? kb.regions.length;
}

export function regionAt(kb: KnowledgeBase, index: number): string {
  return kb.regions[index % kb.regions.length].label;
}

export function ethnicGroupAt(kb: KnowledgeBase, index: number): string {
  return kb.ethnicGroups[index % kb.ethnicGroups.length];
}

export function timePeriodAt(kb: KnowledgeBase, index: number): string {
  return kb.timePeriods[index % kb.timePeriods.length];
}

export function ethnicGroupForRegion(kb: KnowledgeBase, label: string): string {
  const record = kb.regionsByLabel.get(label);
  if (record) return record.ethnicGroup;

  const parts = label.split("_");
  return parts[parts.length - 1];
}

export function countryForRegion(kb: KnowledgeBase, label: string): string {
  return kb.regionsByLabel.get(label)?.country ?? label.split("_")[0];
}

export function coastalDepartureFor(kb: KnowledgeBase, label: string): string {
  return kb.coastalDepartures.get(label) ?? kb.defaultCoastalDeparture;
}

export function medicalMarkersFor(kb: KnowledgeBase, label: string): string[] {
  const markers = kb.medicalMarkers.get(label);
  return markers ? [...markers] : [kb.defaultMedicalMarker];
}

export function baseDescendantEstimate(kb: KnowledgeBase, label: string): number {
  return kb.descendantEstimates.get(label) ?? kb.defaultDescendantEstimate;
}

function slugSegment(value: string): string {
  return encodeURIComponent(value.trim().toLowerCase().replace(/\s+/g, "-"));
}

/** `resourceLink(kb, "travel", "Sierra Leone")` → `<base>/travel/sierra-leone` */
export function resourceLink(kb: KnowledgeBase, ...segments: string[]): string {
  return [kb.resourceBaseUrl, ...segments.map(slugSegment)].join("/");
}
