import { tool } from "@langchain/core/tools";
import { z } from "zod";
import { toToolOutput } from "./toolOutput.js";

const oncologyPathQuerySchema = z.object({
  nodes: z
    .array(z.string())
    .describe("Ordered guideline node identifiers along a treatment pathway."),
});

/**
 * Echoes the supplied guideline nodes. Stands in for a guideline graph
 * traversal so prompts can already reference the tool.
 */
export function createOncologyPathQueryTool() {
  return tool(
    async ({ nodes }): Promise<string> => toToolOutput({ nodes }),
    {
      name: "oncology_path_query",
      description: "Return the guideline pathway nodes supplied in the call.",
      schema: oncologyPathQuerySchema,
    },
  );
}
