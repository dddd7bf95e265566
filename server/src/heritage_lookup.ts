import { InvalidInputError } from "./errors";
import { resourceLink, type KnowledgeBase } from "./knowledge_base";

/* ============================================================================
   Medical heritage
   ============================================================================ */

export type MedicalHeritage = {
  region: string;
  markers: string[];
  recommendations: string[];
  research_resources: string[];
};

/**
 * Only regions with recorded markers are answerable here; resolution
 * results fall back to an advisory marker instead.
 */
export function describeMedicalHeritage(
  region: string,
  kb: KnowledgeBase
): MedicalHeritage {
  const label = region.trim();
  const markers = kb.medicalMarkers.get(label);

  if (!markers) {
    throw new InvalidInputError(`Region not found: ${label || "(empty)"}`, "region");
  }

  return {
    region: label,
    markers: [...markers],
    recommendations: [...kb.medicalRecommendations],
    research_resources: [...kb.medicalResearchResources],
  };
}

/* ============================================================================
   Cultural resources
   ============================================================================ */

export type CulturalResourceGuide = {
  ethnic_group: string;
  language_learning: {
    title: string;
    providers: string[];
    links: string[];
  };
  cultural_organizations: Array<{
    name: string;
    type: string;
  }>;
  heritage_travel: {
    title: string;
    providers: string[];
    typical_duration: string;
  };
  traditional_practices: {
    naming_ceremonies: string;
    festivals: string;
    arts_crafts: string;
  };
};

export function describeCulturalResources(
  ethnicGroup: string,
  kb: KnowledgeBase
): CulturalResourceGuide {
  const group = ethnicGroup.trim();

  if (!group) {
    throw new InvalidInputError("Ethnic group is required.", "ethnic_group");
  }

  return {
    ethnic_group: group,
    language_learning: {
      title: `Learn ${group} Language`,
      providers: [...kb.languageProviders],
      links: [resourceLink(kb, "language", group)],
    },
    cultural_organizations: [
      {
        name: `${group} Cultural Association of North America`,
        type: "Community organization",
      },
    ],
    heritage_travel: {
      title: `Heritage Tours to ${group} Regions`,
      providers: [...kb.travelProviders],
      typical_duration: "10-14 days",
    },
    traditional_practices: {
      naming_ceremonies: `Traditional ${group} naming ceremony information`,
      festivals: `Annual ${group} cultural festivals`,
      arts_crafts: `${group} traditional arts and crafts workshops`,
    },
  };
}
