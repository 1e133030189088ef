import { z } from "zod";
import { buildUrl, requestJson } from "@medeval/shared";
import { ENDPOINTS, HTTP_CONFIG, PUBMED_DEFAULTS } from "../config/index.js";

const esearchResponseSchema = z.object({
  esearchresult: z.object({
    idlist: z.array(z.string()),
  }),
});

export interface PubMedSearchParams {
  term: string;
  /** Maximum PMIDs to return. Defaults to 10. */
  retmax?: number;
}

/**
 * Keyword search against PubMed E-utilities, newest first.
 * Returns PMIDs only.
 */
export async function searchPubMed({
  term,
  retmax = PUBMED_DEFAULTS.retmax,
}: PubMedSearchParams): Promise<string[]> {
  const url = buildUrl(`${ENDPOINTS.pubmed}/esearch.fcgi`, {
    db: "pubmed",
    term,
    retmode: "json",
    sort: PUBMED_DEFAULTS.sort,
    retmax,
  });

  const body = await requestJson(
    { service: "PubMed", url, ...HTTP_CONFIG.pubmed },
    esearchResponseSchema,
  );
  return body.esearchresult.idlist;
}
