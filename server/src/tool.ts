import { describeError, InvalidInputError, SimulationExecutionError } from "./errors";
import { normalizeAncestralInput } from "./normalize_input";
import type { Resolver } from "./resolver";
import { buildResolutionSummary, renderSummaryText } from "./summary_builder";

/* ============================================================================
   Tool Types
   ============================================================================ */

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
    additionalProperties?: boolean;
  };
  annotations?: {
    readOnlyHint?: boolean;
    destructiveHint?: boolean;
    openWorldHint?: boolean;
  };
  _meta?: Record<string, unknown>;
};

export type ToolErrorCode = "invalid_input" | "simulation_failed" | "internal_error";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  structuredContent: Record<string, unknown>;
  isError?: boolean;
};

export type ToolRuntime = {
  definition: ToolDefinition;
  run: (args: unknown) => Promise<ToolResult>;
};

export type ToolRegistry = Record<string, ToolRuntime>;

/* ============================================================================
   Shared helpers
   ============================================================================ */

export function toolErrorCode(err: unknown): ToolErrorCode {
  if (err instanceof InvalidInputError) return "invalid_input";
  if (err instanceof SimulationExecutionError) return "simulation_failed";
  return "internal_error";
}

export function buildErrorResult(
  prefix: string,
  err: unknown,
  structured: Record<string, unknown> = {}
): ToolResult {
  const code = toolErrorCode(err);
  if (code === "internal_error") {
    console.error(`${prefix} failed`, err);
  }

  const message = `${prefix} failed. Reason: ${describeError(err)}`;
  return {
    content: [{ type: "text", text: message }],
    structuredContent: {
      ...structured,
      error: { code, message: describeError(err) },
    },
    isError: true,
  };
}

const stringList = (description: string) => ({
  type: "array",
  items: { type: "string" },
  description,
});

/* ============================================================================
   ancestry_resolve
   ============================================================================ */

export function registerAncestryResolveTool(resolver: Resolver): ToolRegistry {
  const definition: ToolDefinition = {
    name: "ancestry_resolve",
    description:
      "Infer probable ancestral regions, ethnic groups and time periods from a surname and family signals.",
    inputSchema: {
      type: "object",
      properties: {
        surname: {
          type: "string",
          description: "Family surname (1-100 characters)",
        },
        given_names: stringList("Given names, in order"),
        cultural_markers: stringList(
          "Family traditions, stories, foods and practices"
        ),
        geographic_hints: stringList("Known locations in family history"),
        historical_period: {
          type: "string",
          description: "Known historical period, if any",
        },
        language_patterns: stringList("Dialect hints and word usage"),
      },
      required: ["surname"],
      additionalProperties: false,
    },
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      openWorldHint: false,
    },
  };

  const run = async (args: unknown): Promise<ToolResult> => {
    try {
      const input = normalizeAncestralInput(args);
      const outcome = resolver.resolve(input);

      if (!outcome.ok) {
        return buildErrorResult("Ancestry resolution", outcome.error, {
          surname: input.surname,
        });
      }

      const summary = buildResolutionSummary(outcome.result, outcome.trace, {
        cultural_markers: input.cultural_markers.length,
        geographic_hints: input.geographic_hints.length,
      });

      return {
        content: [{ type: "text", text: renderSummaryText(summary) }],
        structuredContent: summary,
      };
    } catch (err) {
      return buildErrorResult("Ancestry resolution", err);
    }
  };

  return {
    [definition.name]: { definition, run },
  };
}
