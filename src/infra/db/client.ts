import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

/**
 * Builds the typed ORM client and keeps the raw driver handle so callers can close the pool.
 */
export const createDb = (connectionString: string) => {
  const sql = postgres(connectionString, { max: 10 });
  const db = drizzle(sql);
  return { db, sql };
};
