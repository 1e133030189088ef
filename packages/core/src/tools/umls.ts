import { tool } from "@langchain/core/tools";
import { z } from "zod";
import { logger } from "@medeval/shared";
import type { UmlsService } from "../services/umlsService.js";
import { toToolOutput, toolErrorOutput } from "./toolOutput.js";

const cuiSchema = z
  .string()
  .regex(/^C\d{7}$/, "A CUI is 'C' followed by seven digits")
  .describe("UMLS concept unique identifier, e.g. 'C0006142'.");

export function createConceptLookupTool(umls: UmlsService) {
  return tool(
    async ({ name }): Promise<string> => {
      const log = logger.child({ tool: "umls_concept_lookup" });

      try {
        const cui = await umls.lookupConcept(name);
        if (!cui) {
          return `No UMLS concept named "${name}".`;
        }
        return toToolOutput({ name, cui });
      } catch (error) {
        return toolErrorOutput(log, "UMLS concept lookup", error);
      }
    },
    {
      name: "umls_concept_lookup",
      description: "Return the UMLS CUI for an exact concept name.",
      schema: z.object({
        name: z.string().min(1).describe("Concept name, matched exactly."),
      }),
    },
  );
}

export function createGetRelatedTool(umls: UmlsService) {
  return tool(
    async ({ fromCui, rela }): Promise<string> => {
      const log = logger.child({ tool: "umls_get_related" });

      try {
        return toToolOutput({
          fromCui,
          rela,
          related: await umls.getRelated(fromCui, rela),
        });
      } catch (error) {
        return toolErrorOutput(log, "UMLS relation lookup", error);
      }
    },
    {
      name: "umls_get_related",
      description:
        "Return CUIs related to a concept by a UMLS relation attribute (RELA), e.g. 'may_be_treated_by'.",
      schema: z.object({
        fromCui: cuiSchema,
        rela: z.string().min(1).describe("Relation attribute (RELA)."),
      }),
    },
  );
}

export function createCuiToNameTool(umls: UmlsService) {
  return tool(
    async ({ cui }): Promise<string> => {
      const log = logger.child({ tool: "umls_cui_to_name" });

      try {
        const name = await umls.cuiToName(cui);
        if (!name) {
          return `No English name recorded for ${cui}.`;
        }
        return toToolOutput({ cui, name });
      } catch (error) {
        return toolErrorOutput(log, "UMLS name lookup", error);
      }
    },
    {
      name: "umls_cui_to_name",
      description:
        "Return the English name for a CUI, preferring the PF/PT term type.",
      schema: z.object({ cui: cuiSchema }),
    },
  );
}
