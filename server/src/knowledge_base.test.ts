import { describe, expect, it } from "vitest";
import knowledgeBaseData from "../data/knowledge_base.json";
import { KnowledgeBaseError } from "./errors";
import {
  coastalDepartureFor,
  countryForRegion,
  ethnicGroupForRegion,
  getKnowledgeBase,
  loadKnowledgeBase,
  medicalMarkersFor,
  regionAt,
  regionRank,
  resourceLink,
  timePeriodAt,
} from "./knowledge_base";

describe("bundled knowledge base", () => {
  const kb = getKnowledgeBase();

  it("indexes the region table in canonical order", () => {
    expect(kb.regions).toHaveLength(16);
    expect(regionAt(kb, 0)).toBe("Ghana_Akan");
    expect(regionAt(kb, 15)).toBe("Gabon_Fang");
    expect(regionAt(kb, 16)).toBe("Ghana_Akan");
    expect(regionRank(kb, "Congo_Kongo")).toBe(4);
    expect(regionRank(kb, "Atlantis")).toBe(16);
    expect(timePeriodAt(kb, 3)).toBe("1751-1800");
  });

  it("resolves multi-word countries from the region record", () => {
    expect(countryForRegion(kb, "Sierra_Leone_Mende")).toBe("Sierra Leone");
    expect(ethnicGroupForRegion(kb, "Sierra_Leone_Mende")).toBe("Mende");
    expect(ethnicGroupForRegion(kb, "Unlisted_Region_Tiv")).toBe("Tiv");
  });

  it("falls back to defaults for unrecorded regions", () => {
    expect(coastalDepartureFor(kb, "Gabon_Fang")).toBe("West African Coast");
    expect(coastalDepartureFor(kb, "Ghana_Akan")).toBe("Gold Coast (Elmina, Cape Coast)");
    expect(medicalMarkersFor(kb, "Gabon_Fang")).toEqual([
      "Consult healthcare provider for details",
    ]);
  });

  it("fills unweighted surname classes with the default uniform table", () => {
    const occupational = kb.surnameClasses.find(c => c.name === "occupational");
    expect(occupational?.weights).toEqual({
      Ghana_Akan: 1 / 6,
      Nigeria_Yoruba: 1 / 6,
      Nigeria_Igbo: 1 / 6,
      Senegal_Wolof: 1 / 6,
      Congo_Kongo: 1 / 6,
      Sierra_Leone_Mende: 1 / 6,
    });
    expect(occupational?.patterns).toContain("smith");
  });

  it("is deep-frozen", () => {
    expect(Object.isFrozen(kb)).toBe(true);
    expect(Object.isFrozen(kb.regions)).toBe(true);
    expect(Object.isFrozen(kb.regions[0])).toBe(true);
  });

  it("builds slugged resource links", () => {
    expect(resourceLink(kb, "travel", "Sierra Leone")).toBe(
      "https://resources.example.org/travel/sierra-leone"
    );
    expect(resourceLink(kb, "dna-partners")).toBe(
      "https://resources.example.org/dna-partners"
    );
  });
});

describe("loadKnowledgeBase", () => {
  it("rejects data that fails the schema", () => {
    expect(() => loadKnowledgeBase({ ...knowledgeBaseData, regions: [] })).toThrow(
      KnowledgeBaseError
    );
    expect(() => loadKnowledgeBase({ ...knowledgeBaseData, regions: [] })).toThrow(
      /^Invalid knowledge base at regions: /
    );
  });

  it("rejects default regions missing from the region table", () => {
    expect(() =>
      loadKnowledgeBase({ ...knowledgeBaseData, default_regions: ["Atlantis"] })
    ).toThrow("Default regions missing from region table: Atlantis");
  });

  it("rejects duplicate region labels", () => {
    const [first] = knowledgeBaseData.regions;
    expect(() =>
      loadKnowledgeBase({
        ...knowledgeBaseData,
        regions: [...knowledgeBaseData.regions, first],
      })
    ).toThrow("Region labels must be unique.");
  });

  it("strips a trailing slash from the resource base url", () => {
    const kb = loadKnowledgeBase({
      ...knowledgeBaseData,
      resource_base_url: "https://heritage.example.org/",
    });
    expect(resourceLink(kb, "orgs", "Akan")).toBe("https://heritage.example.org/orgs/akan");
  });
});
