import { Pool } from "pg"
import type { PgPool } from "./postgres-cache-store"

export function createPgPool(options: { connectionString: string }): PgPool {
  return new Pool({
    connectionString: options.connectionString,
  })
}
