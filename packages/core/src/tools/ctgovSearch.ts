import { tool } from "@langchain/core/tools";
import { z } from "zod";
import { logger } from "@medeval/shared";
import { TRIAL_STATUSES } from "../config/index.js";
import { searchTrials } from "../services/clinicalTrialsService.js";
import { toToolOutput, toolErrorOutput } from "./toolOutput.js";

const ctgovSearchSchema = z.object({
  conditions: z
    .string()
    .optional()
    .describe("Condition or disease, e.g. 'Multiple Myeloma'."),
  interventions: z
    .string()
    .optional()
    .describe(
      "Comma-separated intervention names; every listed intervention must match.",
    ),
  country: z.string().optional().describe("Exact country name."),
  overallStatus: z
    .enum(TRIAL_STATUSES)
    .optional()
    .describe("Overall recruitment status."),
  startDateFrom: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .optional()
    .describe("Earliest study start date (YYYY-MM-DD)."),
  pageSize: z
    .number()
    .int()
    .min(1)
    .max(100)
    .optional()
    .describe("Page size used while paging through results (1–100)."),
});

export function createCtgovSearchTool() {
  return tool(
    async (filters): Promise<string> => {
      const log = logger.child({ tool: "ctgov_search" });
      log.debug("Searching ClinicalTrials.gov", { filters });

      try {
        const nctIds = await searchTrials(filters);
        if (nctIds.length === 0) {
          return "No trials matched these filters. Try removing a filter.";
        }
        return toToolOutput({ count: nctIds.length, nctIds });
      } catch (error) {
        return toolErrorOutput(log, "ClinicalTrials.gov search", error);
      }
    },
    {
      name: "ctgov_search",
      description:
        "Search ClinicalTrials.gov (API v2) and return matching NCT IDs. Supply at least one filter.",
      schema: ctgovSearchSchema,
    },
  );
}
