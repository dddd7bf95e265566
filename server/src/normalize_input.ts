import { InvalidInputError } from "./errors";
import type { AncestralInput } from "./types";

const MAX_SURNAME_LENGTH = 100;

/** Length in code points, so astral characters count once. */
export function charLength(value: string): number {
  return [...value].length;
}

function normalizeSurname(input: unknown): string {
  if (typeof input !== "string") {
    throw new InvalidInputError("Surname is required.", "surname");
  }

  const surname = input.trim();
  if (!surname) {
    throw new InvalidInputError("Surname is required.", "surname");
  }

  if (charLength(surname) > MAX_SURNAME_LENGTH) {
    throw new InvalidInputError(
      `Surname must be at most ${MAX_SURNAME_LENGTH} characters.`,
      "surname"
    );
  }

  return surname;
}

function normalizeStringList(input: unknown, field: string): string[] {
  if (input === undefined || input === null) return [];

  if (!Array.isArray(input)) {
    throw new InvalidInputError(`${field} must be a list of strings.`, field);
  }

  const out: string[] = [];
  for (const entry of input) {
    if (typeof entry !== "string") {
      throw new InvalidInputError(`${field} must be a list of strings.`, field);
    }
    const trimmed = entry.trim();
    if (trimmed) out.push(trimmed);
  }
  return out;
}

function normalizeHistoricalPeriod(input: unknown): string | undefined {
  if (input === undefined || input === null) return undefined;

  if (typeof input !== "string") {
    throw new InvalidInputError(
      "historical_period must be a string.",
      "historical_period"
    );
  }

  const trimmed = input.trim();
  return trimmed ? trimmed : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Builds a frozen `AncestralInput` from untrusted arguments.
 */
export function normalizeAncestralInput(args: unknown): AncestralInput {
  if (!isRecord(args)) {
    throw new InvalidInputError("Arguments must be an object.");
  }

  const historicalPeriod = normalizeHistoricalPeriod(args.historical_period);

  const input: AncestralInput = {
    surname: normalizeSurname(args.surname),
    given_names: Object.freeze(normalizeStringList(args.given_names, "given_names")),
    cultural_markers: Object.freeze(
      normalizeStringList(args.cultural_markers, "cultural_markers")
    ),
    geographic_hints: Object.freeze(
      normalizeStringList(args.geographic_hints, "geographic_hints")
    ),
    language_patterns: Object.freeze(
      normalizeStringList(args.language_patterns, "language_patterns")
    ),
    ...(historicalPeriod !== undefined ? { historical_period: historicalPeriod } : {}),
  };

  return Object.freeze(input);
}

/**
 * Typed convenience for callers that already hold the fields.
 */
export function createAncestralInput(fields: {
  surname: string;
  given_names?: readonly string[];
  cultural_markers?: readonly string[];
  geographic_hints?: readonly string[];
  historical_period?: string;
  language_patterns?: readonly string[];
}): AncestralInput {
  return normalizeAncestralInput(fields);
}
