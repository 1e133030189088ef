import type { StructuredToolInterface } from "@langchain/core/tools";
import type { Pool } from "pg";
import { UmlsService } from "../services/umlsService.js";

import { createPubmedSearchTool } from "./pubmedSearch.js";
import { createCtgovSearchTool } from "./ctgovSearch.js";
import {
  createAssociatedDiseasesTool,
  createSafetyTool,
  createTractabilityTool,
} from "./openTargets.js";
import {
  createConceptLookupTool,
  createCuiToNameTool,
  createGetRelatedTool,
} from "./umls.js";
import { createOncologyPathQueryTool } from "./oncologyPathQuery.js";

export {
  createPubmedSearchTool,
  createCtgovSearchTool,
  createAssociatedDiseasesTool,
  createTractabilityTool,
  createSafetyTool,
  createConceptLookupTool,
  createGetRelatedTool,
  createCuiToNameTool,
  createOncologyPathQueryTool,
};

/**
 * Dependencies required to instantiate the full tool suite.
 */
export interface ToolDependencies {
  /** Postgres pool holding the UMLS tables. Omit to leave out UMLS tools. */
  pool?: Pool;
}

/**
 * Create every biomedical tool, wired with its dependencies. The array can
 * be bound to any LangChain chat model with `bindTools`.
 *
 * @example
 * ```ts
 * const pool = createPool();
 * const model = createChatModel(MODEL_CONFIG.responder);
 * const withTools = model.bindTools?.(getAllTools({ pool }));
 * ```
 */
export function getAllTools(
  deps: ToolDependencies = {},
): StructuredToolInterface[] {
  const tools: StructuredToolInterface[] = [
    createPubmedSearchTool(),
    createCtgovSearchTool(),
    createAssociatedDiseasesTool(),
    createAssociatedDiseasesTool("opentargets_search"),
    createTractabilityTool(),
    createSafetyTool(),
    createOncologyPathQueryTool(),
  ];

  if (deps.pool) {
    const umls = new UmlsService(deps.pool);
    tools.push(
      createConceptLookupTool(umls),
      createGetRelatedTool(umls),
      createCuiToNameTool(umls),
    );
  }

  return tools;
}
