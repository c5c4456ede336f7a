import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

/**
 * Returns the typed ORM handle plus the raw client, which owns the pool and its shutdown.
 */
export const createDb = (connectionString: string) => {
  const sql = postgres(connectionString, { max: 5 });
  const db = drizzle(sql);
  return { db, sql };
};
