import { z } from "zod";
import {
  ValidationError,
  buildUrl,
  logger,
  requestJson,
} from "@medeval/shared";
import {
  CLINICAL_TRIALS_DEFAULTS,
  ENDPOINTS,
  HTTP_CONFIG,
  TRIAL_STATUSES,
  type TrialStatus,
} from "../config/index.js";

const log = logger.child({ service: "clinical-trials" });

export interface TrialSearchFilters {
  /** Condition or disease, e.g. "Multiple Myeloma". */
  conditions?: string | undefined;
  /** Comma- or semicolon-separated intervention names; all must match. */
  interventions?: string | undefined;
  /** Exact country name. */
  country?: string | undefined;
  overallStatus?: string | undefined;
  /** Earliest study start date, YYYY-MM-DD. */
  startDateFrom?: string | undefined;
  /** Studies per page, 1–100. Defaults to 100. */
  pageSize?: number | undefined;
}

const studiesPageSchema = z.object({
  studies: z
    .array(
      z.object({
        protocolSection: z.object({
          identificationModule: z.object({ nctId: z.string() }),
        }),
      }),
    )
    .default([]),
  nextPageToken: z.string().optional(),
});

function isTrialStatus(value: string): value is TrialStatus {
  return (TRIAL_STATUSES as readonly string[]).includes(value);
}

/**
 * Builds ClinicalTrials.gov v2 `/studies` query parameters.
 *
 * @throws {ValidationError} When no filter is supplied, the status is not a
 *   known recruitment status, or the page size is outside 1–100
 */
export function buildTrialSearchParams(
  filters: TrialSearchFilters,
  pageToken?: string,
): Record<string, string> {
  const { conditions, interventions, country, overallStatus, startDateFrom } =
    filters;
  const pageSize = filters.pageSize ?? CLINICAL_TRIALS_DEFAULTS.pageSize;

  if (
    !conditions &&
    !interventions &&
    !country &&
    !overallStatus &&
    !startDateFrom
  ) {
    throw new ValidationError("At least one filter criterion must be supplied");
  }
  if (
    !Number.isInteger(pageSize) ||
    pageSize < 1 ||
    pageSize > CLINICAL_TRIALS_DEFAULTS.maxPageSize
  ) {
    throw new ValidationError(`pageSize must be between 1 and 100`, {
      context: { pageSize },
    });
  }

  const params: Record<string, string> = {
    pageSize: String(pageSize),
    countTotal: "false",
    markupFormat: "markdown",
  };

  if (conditions) {
    params["query.cond"] = conditions;
  }

  if (interventions) {
    const terms = interventions
      .split(/[;,]/)
      .map((term) => term.trim())
      .filter(Boolean);
    params["query.intr"] = terms.join(" AND ");
  }

  if (country) {
    params["query.locn"] = `"${country}"`;
  }

  if (overallStatus) {
    const status = overallStatus.toUpperCase();
    if (!isTrialStatus(status)) {
      throw new ValidationError(`Unknown overall status "${overallStatus}"`, {
        context: { allowed: TRIAL_STATUSES },
      });
    }
    params["filter.overallStatus"] = status;
  }

  if (startDateFrom) {
    params["filter.advanced"] = `AREA[StartDate]RANGE[${startDateFrom},MAX]`;
  }

  if (pageToken) {
    params.pageToken = pageToken;
  }

  return params;
}

/**
 * Returns NCT IDs of every study matching the filters, following
 * `nextPageToken` until the registry stops returning one.
 */
export async function searchTrials(
  filters: TrialSearchFilters,
): Promise<string[]> {
  const nctIds: string[] = [];
  let pageToken: string | undefined;
  let pages = 0;

  do {
    const url = buildUrl(
      ENDPOINTS.clinicalTrials,
      buildTrialSearchParams(filters, pageToken),
    );
    const page = await requestJson(
      { service: "ClinicalTrials.gov", url, ...HTTP_CONFIG.clinicalTrials },
      studiesPageSchema,
    );

    for (const study of page.studies) {
      nctIds.push(study.protocolSection.identificationModule.nctId);
    }
    pageToken = page.nextPageToken || undefined;
    pages++;
  } while (pageToken);

  log.debug("Trial search complete", { pages, studies: nctIds.length });
  return nctIds;
}
