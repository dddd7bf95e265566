import { describe, expect, it } from "vitest";
import { InvalidInputError } from "./errors";
import { charLength, createAncestralInput, normalizeAncestralInput } from "./normalize_input";

describe("normalizeAncestralInput", () => {
  it("trims the surname and drops blank list entries", () => {
    const input = normalizeAncestralInput({
      surname: "  Bradley ",
      cultural_markers: [" Kente cloth ", "   ", ""],
      historical_period: "  ",
    });

    expect(input).toEqual({
      surname: "Bradley",
      given_names: [],
      cultural_markers: ["Kente cloth"],
      geographic_hints: [],
      language_patterns: [],
    });
    expect(Object.isFrozen(input)).toBe(true);
    expect(Object.isFrozen(input.cultural_markers)).toBe(true);
  });

  it("keeps a historical period when given", () => {
    const input = createAncestralInput({ surname: "King", historical_period: "1800s" });
    expect(input.historical_period).toBe("1800s");
  });

  it("rejects a missing or blank surname", () => {
    expect(() => normalizeAncestralInput({})).toThrow(InvalidInputError);
    expect(() => normalizeAncestralInput({ surname: "   " })).toThrow(
      "Surname is required."
    );
  });

  it("rejects an overlong surname", () => {
    expect(() => normalizeAncestralInput({ surname: "a".repeat(101) })).toThrow(
      "Surname must be at most 100 characters."
    );
    expect(normalizeAncestralInput({ surname: "a".repeat(100) }).surname).toHaveLength(100);
  });

  it("counts surname length in characters, not code units", () => {
    const surname = "\u{2000B}".repeat(100);
    expect(charLength(surname)).toBe(100);
    expect(normalizeAncestralInput({ surname }).surname).toBe(surname);
    expect(() => normalizeAncestralInput({ surname: surname + "\u{2000B}" })).toThrow(
      "Surname must be at most 100 characters."
    );
  });

  it("accepts long stories and many entries", () => {
    const story = "Grandmother wove kente cloth every winter and told us why. ".repeat(10);
    const input = normalizeAncestralInput({
      surname: "King",
      cultural_markers: [story, ...Array.from({ length: 60 }, (_, i) => `marker ${i}`)],
    });
    expect(input.cultural_markers).toHaveLength(61);
    expect(input.cultural_markers[0]).toBe(story.trim());
  });

  it("rejects malformed lists", () => {
    expect(() =>
      normalizeAncestralInput({ surname: "King", geographic_hints: "Georgia" })
    ).toThrow("geographic_hints must be a list of strings.");
    expect(() =>
      normalizeAncestralInput({ surname: "King", given_names: ["Ann", 3] })
    ).toThrow("given_names must be a list of strings.");
  });

  it("reports the offending field", () => {
    try {
      normalizeAncestralInput({ surname: "King", historical_period: 1800 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      expect(err).toMatchObject({ field: "historical_period", code: "invalid_input" });
    }
  });

  it("rejects non-object arguments", () => {
    expect(() => normalizeAncestralInput(null)).toThrow("Arguments must be an object.");
    expect(() => normalizeAncestralInput(["King"])).toThrow(InvalidInputError);
  });
});
