import { Pool } from "pg";
import { getUmlsDatabaseUrl } from "./env.js";

/**
 * Creates a Postgres pool for the UMLS terminology store. The caller owns
 * the pool and must `end()` it; nothing here caches the instance.
 * `sslmode=require` in the URL turns on SSL with certificate validation.
 */
export function createPool(
  connectionString: string = getUmlsDatabaseUrl(),
): Pool {
  const needsSsl = connectionString.includes("sslmode=require");
  return new Pool({
    connectionString,
    max: 2,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
    ...(needsSsl ? { ssl: true } : {}),
  });
}
