import { tool } from "@langchain/core/tools";
import { z } from "zod";
import { logger } from "@medeval/shared";
import { PUBMED_DEFAULTS } from "../config/index.js";
import { searchPubMed } from "../services/pubmedService.js";
import { toToolOutput, toolErrorOutput } from "./toolOutput.js";

const pubmedSearchSchema = z.object({
  term: z
    .string()
    .min(1)
    .describe(
      "PubMed query, e.g. 'osimertinib EGFR T790M'. Boolean operators and field tags are allowed.",
    ),
  retmax: z
    .number()
    .int()
    .min(1)
    .max(100)
    .optional()
    .describe("Maximum number of PMIDs to return (default 10)."),
});

export function createPubmedSearchTool() {
  return tool(
    async ({ term, retmax }): Promise<string> => {
      const log = logger.child({ tool: "pubmed_search" });
      log.debug("Searching PubMed", { term, retmax });

      try {
        const pmids = await searchPubMed({
          term,
          retmax: retmax ?? PUBMED_DEFAULTS.retmax,
        });
        if (pmids.length === 0) {
          return `No PubMed articles found for "${term}". Try broader terms.`;
        }
        return toToolOutput({ pmids });
      } catch (error) {
        return toolErrorOutput(log, "PubMed search", error);
      }
    },
    {
      name: "pubmed_search",
      description:
        "Search PubMed and return a list of PMIDs, newest first. Use to find literature supporting a clinical claim.",
      schema: pubmedSearchSchema,
    },
  );
}
