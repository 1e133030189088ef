import { z } from "zod";
import { ExternalServiceError, requestJson } from "@medeval/shared";
import {
  ENDPOINTS,
  HTTP_CONFIG,
  OPEN_TARGETS_DEFAULTS,
} from "../config/index.js";

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

const ASSOCIATED_DISEASES_QUERY = `
  query AssociatedDiseases($ensemblId: String!) {
    target(ensemblId: $ensemblId) {
      associatedDiseases { rows { disease { id name } score } }
    }
  }
`;

const TRACTABILITY_QUERY = `
  query Tractability($ensemblId: String!) {
    target(ensemblId: $ensemblId) {
      tractability { modality label value }
    }
  }
`;

const SEARCH_QUERY = `
  query Search($queryString: String!) {
    search(queryString: $queryString) {
      hits { id entity description }
    }
  }
`;

const SAFETY_LIABILITIES_QUERY = `
  query SafetyLiabilities($ensemblId: String!) {
    target(ensemblId: $ensemblId) {
      safetyLiabilities {
        event
        biosamples { tissueLabel tissueId }
        effects { dosing direction }
      }
    }
  }
`;

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

const diseaseAssociationSchema = z.object({
  disease: z.object({ id: z.string(), name: z.string() }),
  score: z.number(),
});

const tractabilitySchema = z.object({
  modality: z.string(),
  label: z.string(),
  value: z.boolean(),
});

const biosampleSchema = z.object({
  tissueLabel: z.string().nullable(),
  tissueId: z.string().nullable(),
});

const effectSchema = z.object({
  dosing: z.string().nullable(),
  direction: z.string().nullable(),
});

const safetyLiabilitySchema = z.object({
  event: z.string().nullable(),
  biosamples: z.array(biosampleSchema).nullable(),
  effects: z.array(effectSchema).nullable(),
});

const graphQlEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

export type DiseaseAssociation = z.infer<typeof diseaseAssociationSchema>;
export type Tractability = z.infer<typeof tractabilitySchema>;

export interface SafetyLiability {
  biosamples: z.infer<typeof biosampleSchema>[];
  effects: z.infer<typeof effectSchema>[];
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

/**
 * Posts a GraphQL query and validates `data` against `schema`.
 *
 * @throws {ExternalServiceError} On GraphQL errors or an unexpected shape
 */
async function queryOpenTargets<T>(
  query: string,
  variables: Record<string, unknown>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  const envelope = await requestJson(
    {
      service: "OpenTargets",
      url: ENDPOINTS.openTargets,
      body: { query, variables },
      ...HTTP_CONFIG.openTargets,
    },
    graphQlEnvelopeSchema,
  );
  if (envelope.errors?.length) {
    throw new ExternalServiceError(
      `OpenTargets query failed: ${envelope.errors.map((e) => e.message).join("; ")}`,
      { code: "OPENTARGETS_QUERY_ERROR", context: { variables } },
    );
  }

  const data = schema.safeParse(envelope.data);
  if (!data.success) {
    throw new ExternalServiceError("Unexpected OpenTargets data shape", {
      code: "OPENTARGETS_RESPONSE_INVALID",
      context: { variables },
    });
  }
  return data.data;
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

/**
 * Diseases associated with an Ensembl target whose overall association
 * score is at least `minScore`. An unknown target yields an empty list.
 */
export async function getAssociatedDiseases(
  targetId: string,
  minScore: number = OPEN_TARGETS_DEFAULTS.minAssociationScore,
): Promise<DiseaseAssociation[]> {
  const data = await queryOpenTargets(
    ASSOCIATED_DISEASES_QUERY,
    { ensemblId: targetId },
    z.object({
      target: z
        .object({
          associatedDiseases: z.object({
            rows: z.array(diseaseAssociationSchema),
          }),
        })
        .nullable(),
    }),
  );
  const rows = data.target?.associatedDiseases.rows ?? [];
  return rows.filter((row) => row.score >= minScore);
}

/** Tractability modalities of a target whose `value` equals `value`. */
export async function getTractability(
  targetId: string,
  value = true,
): Promise<Tractability[]> {
  const data = await queryOpenTargets(
    TRACTABILITY_QUERY,
    { ensemblId: targetId },
    z.object({
      target: z
        .object({ tractability: z.array(tractabilitySchema).nullable() })
        .nullable(),
    }),
  );
  const rows = data.target?.tractability ?? [];
  return rows.filter((row) => row.value === value);
}

/**
 * Resolves `symbol` to the first target hit, then returns biosamples and
 * effects of the safety liability whose event matches `event`
 * case-insensitively. `null` when there is no target or no such event.
 */
export async function getSafetyLiability(
  symbol: string,
  event: string,
): Promise<SafetyLiability | null> {
  const search = await queryOpenTargets(
    SEARCH_QUERY,
    { queryString: symbol },
    z.object({
      search: z.object({
        hits: z.array(
          z.object({
            id: z.string(),
            entity: z.string(),
            description: z.string().nullable().optional(),
          }),
        ),
      }),
    }),
  );

  const targetHit = search.search.hits.find((hit) => hit.entity === "target");
  if (!targetHit) {
    return null;
  }

  const data = await queryOpenTargets(
    SAFETY_LIABILITIES_QUERY,
    { ensemblId: targetHit.id },
    z.object({
      target: z
        .object({
          safetyLiabilities: z.array(safetyLiabilitySchema).nullable(),
        })
        .nullable(),
    }),
  );

  const wanted = event.toLowerCase();
  const liability = (data.target?.safetyLiabilities ?? []).find(
    (row) => row.event?.toLowerCase() === wanted,
  );
  if (!liability) {
    return null;
  }
  return {
    biosamples: liability.biosamples ?? [],
    effects: liability.effects ?? [],
  };
}
