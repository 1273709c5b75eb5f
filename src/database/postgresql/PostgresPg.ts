import type * as RTE from "fp-ts/ReaderTaskEither";
import * as TE from "fp-ts/TaskEither";
import type { DatabaseDeps } from "../../config/deps";
import { type AppError, fromDatabaseError } from "../../model/errors";
import type { QueryOutcome } from "./PostgresOperation";

export const query =
  (
    queryString: string,
    values?: ReadonlyArray<unknown>
  ): RTE.ReaderTaskEither<DatabaseDeps, AppError, QueryOutcome> =>
  ({ pgClient }) =>
    TE.tryCatch(
      async () => await pgClient.query(queryString, values),
      fromDatabaseError
    );
