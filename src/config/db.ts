import { Kysely, PostgresDialect } from "kysely";
import pg from "pg";
import { env } from "./env.js";

/** `cities` table. pg returns NUMERIC/BIGINT columns as strings, hence the unions. */
export interface CitiesTable {
  id: string;
  city: string | null;
  lat: number | string | null;
  lng: number | string | null;
  population: number | string | null;
}

export interface Database {
  cities: CitiesTable;
}

export function createDb(connectionString: string | undefined = env.DATABASE_URL): Kysely<Database> {
  return new Kysely<Database>({
    dialect: new PostgresDialect({
      pool: new pg.Pool({
        connectionString,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
      }),
    }),
  });
}
