import { describe, it, expect } from "vitest";
import type { Pool } from "pg";
import { getAllTools } from "./index.js";

describe("getAllTools", () => {
  it("returns the web-backed tools when no pool is given", () => {
    const names = getAllTools().map((t) => t.name);

    expect(names).toEqual([
      "pubmed_search",
      "ctgov_search",
      "opentargets_associated_diseases",
      "opentargets_search",
      "opentargets_tractability",
      "opentargets_safety",
      "oncology_path_query",
    ]);
  });

  it("adds the UMLS tools when a pool is given", () => {
    const pool = { query: async () => ({ rows: [] }) };
    const names = getAllTools({ pool: pool as unknown as Pool }).map(
      (t) => t.name,
    );

    expect(names).toHaveLength(10);
    expect(names.slice(-3)).toEqual([
      "umls_concept_lookup",
      "umls_get_related",
      "umls_cui_to_name",
    ]);
  });

  it("gives every tool a unique name", () => {
    const pool = { query: async () => ({ rows: [] }) };
    const names = getAllTools({ pool: pool as unknown as Pool }).map(
      (t) => t.name,
    );

    expect(new Set(names).size).toBe(names.length);
  });
});
