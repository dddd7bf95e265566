import { InvalidInputError } from "./errors";
import { describeCulturalResources } from "./heritage_lookup";
import type { KnowledgeBase } from "./knowledge_base";
import { buildErrorResult, type ToolDefinition, type ToolRegistry, type ToolResult } from "./tool";

function readEthnicGroup(args: unknown): string {
  if (typeof args === "object" && args !== null && "ethnic_group" in args) {
    const group = args.ethnic_group;
    if (typeof group === "string") return group;
  }
  throw new InvalidInputError("Ethnic group is required.", "ethnic_group");
}

export function registerCulturalResourcesTool(kb: KnowledgeBase): ToolRegistry {
  const definition: ToolDefinition = {
    name: "ancestry_cultural_resources",
    description:
      "Cultural reconnection resources (language, organizations, travel, practices) for an ethnic group.",
    inputSchema: {
      type: "object",
      properties: {
        ethnic_group: {
          type: "string",
          description: "Ethnic group name (e.g. Yoruba)",
        },
      },
      required: ["ethnic_group"],
      additionalProperties: false,
    },
    annotations: { readOnlyHint: true },
  };

  const run = async (args: unknown): Promise<ToolResult> => {
    try {
      const guide = describeCulturalResources(readEthnicGroup(args), kb);
      const text =
        `${guide.language_learning.title}; ` +
        `${guide.heritage_travel.title} (${guide.heritage_travel.typical_duration}).`;

      return {
        content: [{ type: "text", text }],
        structuredContent: guide,
      };
    } catch (err) {
      return buildErrorResult("Cultural resources lookup", err);
    }
  };

  return {
    [definition.name]: { definition, run },
  };
}
