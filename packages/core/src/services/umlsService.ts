import type { Pool } from "pg";

/** Term types treated as the preferred display name of a concept. */
const PREFERRED_TERM_TYPES = new Set(["PF", "PT"]);

interface ConceptRow {
  cui: string;
}

interface RelationRow {
  cui1: string;
}

interface ConceptNameRow {
  str: string;
  tty: string;
}

/**
 * Concept-normalization lookups against a UMLS store loaded into Postgres
 * (`concepts`, `mrrel`, `mrconso`). The pool is owned by the caller.
 */
export class UmlsService {
  constructor(private readonly pool: Pool) {}

  /** Concept id for an exact concept name, or "" when unknown. */
  async lookupConcept(name: string): Promise<string> {
    const result = await this.pool.query<ConceptRow>(
      "SELECT cui FROM concepts WHERE str = $1 LIMIT 1",
      [name],
    );
    return result.rows[0]?.cui ?? "";
  }

  /** Concept ids related to `fromCui` by the relation attribute `rela`. */
  async getRelated(fromCui: string, rela: string): Promise<string[]> {
    const result = await this.pool.query<RelationRow>(
      "SELECT cui1 FROM mrrel WHERE cui2 = $1 AND rela = $2",
      [fromCui, rela],
    );
    return result.rows.map((row) => row.cui1);
  }

  /**
   * English display name for a concept id. A PF/PT term wins (the last one
   * returned); otherwise the first English name; "" when there is none.
   */
  async cuiToName(cui: string): Promise<string> {
    const result = await this.pool.query<ConceptNameRow>(
      "SELECT str, tty FROM mrconso WHERE lat = 'ENG' AND cui = $1",
      [cui],
    );

    let preferred: string | undefined;
    for (const row of result.rows) {
      if (PREFERRED_TERM_TYPES.has(row.tty)) {
        preferred = row.str;
      }
    }
    return preferred ?? result.rows[0]?.str ?? "";
  }
}
