export const ENDPOINTS = {
  pubmed: "https://eutils.ncbi.nlm.nih.gov/entrez/eutils",
  clinicalTrials: "https://clinicaltrials.gov/api/v2/studies",
  openTargets: "https://api.platform.opentargets.org/api/v4/graphql",
} as const;

/** Per-service request settings passed to requestJson. */
export const HTTP_CONFIG = {
  pubmed: { timeoutMs: 20_000, maxRetries: 2 },
  clinicalTrials: { timeoutMs: 30_000, maxRetries: 2 },
  openTargets: { timeoutMs: 20_000, maxRetries: 2 },
} as const;

export const PUBMED_DEFAULTS = {
  retmax: 10,
  sort: "pub+date",
} as const;

export const CLINICAL_TRIALS_DEFAULTS = {
  pageSize: 100,
  maxPageSize: 100,
} as const;

export const TRIAL_STATUSES = [
  "NOT_YET_RECRUITING",
  "RECRUITING",
  "ACTIVE",
  "COMPLETED",
  "SUSPENDED",
  "TERMINATED",
  "WITHDRAWN",
] as const;

export type TrialStatus = (typeof TRIAL_STATUSES)[number];

export const OPEN_TARGETS_DEFAULTS = {
  minAssociationScore: 0.5,
} as const;
