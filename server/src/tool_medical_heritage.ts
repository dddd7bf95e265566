import { InvalidInputError } from "./errors";
import { describeMedicalHeritage } from "./heritage_lookup";
import type { KnowledgeBase } from "./knowledge_base";
import { buildErrorResult, type ToolDefinition, type ToolRegistry, type ToolResult } from "./tool";

function readRegion(args: unknown): string {
  if (typeof args === "object" && args !== null && "region" in args) {
    const region = args.region;
    if (typeof region === "string") return region;
  }
  throw new InvalidInputError("Region is required.", "region");
}

export function registerMedicalHeritageTool(kb: KnowledgeBase): ToolRegistry {
  const definition: ToolDefinition = {
    name: "ancestry_medical_heritage",
    description:
      "List health markers recorded for an ancestral region, with screening recommendations.",
    inputSchema: {
      type: "object",
      properties: {
        region: {
          type: "string",
          description: "Region label (e.g. Ghana_Akan)",
          enum: [...kb.medicalMarkers.keys()],
        },
      },
      required: ["region"],
      additionalProperties: false,
    },
    annotations: { readOnlyHint: true },
  };

  const run = async (args: unknown): Promise<ToolResult> => {
    try {
      const heritage = describeMedicalHeritage(readRegion(args), kb);
      const text =
        `Medical heritage markers for ${heritage.region}: ` +
        `${heritage.markers.join("; ")}.`;

      return {
        content: [{ type: "text", text }],
        structuredContent: heritage,
      };
    } catch (err) {
      return buildErrorResult("Medical heritage lookup", err);
    }
  };

  return {
    [definition.name]: { definition, run },
  };
}
