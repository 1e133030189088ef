import { tool } from "@langchain/core/tools";
import { z } from "zod";
import { logger } from "@medeval/shared";
import { OPEN_TARGETS_DEFAULTS } from "../config/index.js";
import {
  getAssociatedDiseases,
  getSafetyLiability,
  getTractability,
} from "../services/openTargetsService.js";
import { toToolOutput, toolErrorOutput } from "./toolOutput.js";

const associatedDiseasesSchema = z.object({
  targetId: z.string().describe("Ensembl gene id, e.g. 'ENSG00000141510'."),
  minScore: z
    .number()
    .min(0)
    .max(1)
    .optional()
    .describe("Minimum overall association score (default 0.5)."),
});

const tractabilitySchema = z.object({
  targetId: z.string().describe("Ensembl gene id."),
  value: z
    .boolean()
    .optional()
    .describe("Return modalities whose assessment equals this value (default true)."),
});

const safetySchema = z.object({
  symbol: z.string().describe("Gene symbol, e.g. 'EGFR'."),
  event: z
    .string()
    .describe("Safety event name, matched case-insensitively."),
});

/**
 * `opentargets_associated_diseases`, or the same tool under a legacy name
 * for prompts written against it.
 */
export function createAssociatedDiseasesTool(
  name = "opentargets_associated_diseases",
) {
  return tool(
    async ({ targetId, minScore }): Promise<string> => {
      const log = logger.child({ tool: name });
      log.debug("Fetching associated diseases", { targetId, minScore });

      try {
        const rows = await getAssociatedDiseases(
          targetId,
          minScore ?? OPEN_TARGETS_DEFAULTS.minAssociationScore,
        );
        if (rows.length === 0) {
          return `No diseases associated with ${targetId} above the score cutoff.`;
        }
        return toToolOutput(rows);
      } catch (error) {
        return toolErrorOutput(log, "OpenTargets association lookup", error);
      }
    },
    {
      name,
      description:
        "Return diseases associated with an OpenTargets target, filtered by a minimum association score.",
      schema: associatedDiseasesSchema,
    },
  );
}

export function createTractabilityTool() {
  return tool(
    async ({ targetId, value }): Promise<string> => {
      const log = logger.child({ tool: "opentargets_tractability" });

      try {
        return toToolOutput(await getTractability(targetId, value ?? true));
      } catch (error) {
        return toolErrorOutput(log, "OpenTargets tractability lookup", error);
      }
    },
    {
      name: "opentargets_tractability",
      description:
        "Return tractability modalities (small molecule, antibody, PROTAC, other) for a target, filtered by assessment value.",
      schema: tractabilitySchema,
    },
  );
}

export function createSafetyTool() {
  return tool(
    async ({ symbol, event }): Promise<string> => {
      const log = logger.child({ tool: "opentargets_safety" });

      try {
        const liability = await getSafetyLiability(symbol, event);
        if (!liability) {
          return `No "${event}" safety liability recorded for ${symbol}.`;
        }
        return toToolOutput(liability);
      } catch (error) {
        return toolErrorOutput(log, "OpenTargets safety lookup", error);
      }
    },
    {
      name: "opentargets_safety",
      description:
        "Return biosamples and effects of a named safety liability for a gene symbol.",
      schema: safetySchema,
    },
  );
}
