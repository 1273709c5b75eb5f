import * as E from "fp-ts/Either";
import type * as RTE from "fp-ts/ReaderTaskEither";
import * as TE from "fp-ts/TaskEither";
import { pipe } from "fp-ts/lib/function";
import { Client, type ClientConfig } from "pg";
import type { DatabaseDeps } from "../../config/deps";
import { type AppError, unexpectedError } from "../../model/errors";
import { log } from "../../utilities/logger";

export type QueryOutcome = {
  readonly rows: ReadonlyArray<unknown>;
  readonly rowCount: number | null;
};

/**
 * The part of a node-postgres `Client` the CLI relies on: one connection,
 * opened and ended by the caller.
 */
export interface PGClient {
  connect(): Promise<void>;
  end(): Promise<void>;
  query(text: string, values?: ReadonlyArray<unknown>): Promise<QueryOutcome>;
}

export type PGClientFactory = (config: ClientConfig) => PGClient;

export const pgClientFromConfig: PGClientFactory = (config) => {
  const client = new Client(config);
  return {
    connect: () => client.connect(),
    end: () => client.end(),
    query: (text, values) =>
      client.query(text, values === undefined ? undefined : [...values]),
  };
};

const toUnexpectedError = (error: unknown): AppError =>
  unexpectedError(E.toError(error).message);

export const createPGClient = (
  config: ClientConfig,
  factory: PGClientFactory = pgClientFromConfig
): TE.TaskEither<AppError, PGClient> =>
  TE.tryCatch(async () => factory(config), toUnexpectedError);

export const connectPGClient = (
  client: PGClient
): TE.TaskEither<AppError, PGClient> =>
  pipe(
    TE.tryCatch(async () => await client.connect(), toUnexpectedError),
    TE.map(() => client)
  );

export const disconnectPGClient = (
  client: PGClient
): TE.TaskEither<AppError, void> =>
  TE.tryCatch(async () => await client.end(), toUnexpectedError);

export const disconnectPGClientWithoutError = (
  client: PGClient
): TE.TaskEither<never, void> =>
  pipe(
    client,
    disconnectPGClient,
    TE.orElseW((_) => TE.right(undefined))
  );

const acquirePGClient = (
  config: ClientConfig,
  factory: PGClientFactory
): TE.TaskEither<AppError, PGClient> =>
  pipe(
    createPGClient(config, factory),
    log.taskEither.debug("Connecting to PostgreSQL..."),
    TE.chain((client) =>
      pipe(
        connectPGClient(client),
        TE.orElseW((error: AppError) =>
          pipe(
            disconnectPGClientWithoutError(client),
            TE.chain(() => TE.left(error))
          )
        )
      )
    ),
    log.taskEither.debug("Connected to PostgreSQL"),
    log.taskEither.debugLeft(
      (error: AppError) => `Error connecting to PG - ${error.message}`
    )
  );

/**
 * Runs one database operation on its own connection. The client is ended
 * once the operation settles, whatever its outcome.
 */
export const withPGClient =
  (config: ClientConfig, factory: PGClientFactory = pgClientFromConfig) =>
  <A>(
    operation: RTE.ReaderTaskEither<DatabaseDeps, AppError, A>
  ): TE.TaskEither<AppError, A> =>
    TE.bracket(
      acquirePGClient(config, factory),
      (pgClient) => operation({ pgClient }),
      (pgClient) =>
        pipe(
          disconnectPGClient(pgClient),
          log.taskEither.debug("Disconnected from PostgreSQL")
        )
    );
