import type { PGClient } from "../database/postgresql/PostgresOperation";

export interface DatabaseDeps {
  pgClient: PGClient;
}
