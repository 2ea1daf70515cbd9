import { Kysely, PostgresDialect, type Generated } from "kysely";
import type pg from "pg";

// Read models loaded by the ETL; this service never writes to them.

export interface ProvidersTable {
  id: Generated<number>;
  provider_id: string;
  name: string;
  city: string | null;
  state: string | null;
  zip_code: string | null;
  latitude: number | null;
  longitude: number | null;
}

export interface ProceduresTable {
  id: Generated<number>;
  provider_id: string;
  ms_drg_definition: string;
  total_discharges: number | null;
  /** NUMERIC(14,2); pg returns these as strings. */
  average_covered_charges: string | null;
  average_total_payments: string | null;
  average_medicare_payments: string | null;
}

export interface RatingsTable {
  id: Generated<number>;
  provider_id: string;
  rating: number;
}

export interface Database {
  providers: ProvidersTable;
  procedures: ProceduresTable;
  ratings: RatingsTable;
}

export function createDb(pool: pg.Pool): Kysely<Database> {
  return new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  });
}
