import * as E from "fp-ts/Either";
import * as O from "fp-ts/Option";
import * as RA from "fp-ts/ReadonlyArray";
import * as S from "fp-ts/string";
import { pipe } from "fp-ts/lib/function";
import type * as t from "io-ts";
import type { ClientConfig } from "pg";
import { type ConfigError, configError } from "../model/errors";
import { PostgreSQLConfig } from "./ioConfig";

export const PG_ENV_KEYS = [
  "PGHOST",
  "PGPORT",
  "PGUSER",
  "PGPASSWORD",
  "PGDATABASE",
] as const;

export type Env = Readonly<Record<string, string | undefined>>;

const CREDENTIALS_HINT =
  "Copy .env.example to .env and fill in your credentials.";

const missingKeys = (env: Env): ReadonlyArray<string> =>
  pipe(
    PG_ENV_KEYS,
    RA.filter((key) => !env[key])
  );

// context[0] is the whole record, context[1] the offending variable
const invalidKeys = (errors: t.Errors): ReadonlyArray<string> =>
  pipe(
    errors,
    RA.filterMap((error) =>
      pipe(
        error.context,
        RA.lookup(1),
        O.map((entry) => entry.key)
      )
    ),
    RA.uniq(S.Eq)
  );

const toConfigError =
  (label: string) =>
  (keys: ReadonlyArray<string>): ConfigError =>
    configError(keys, `${label}: ${keys.join(", ")}. ${CREDENTIALS_HINT}`);

/**
 * Builds the node-postgres client configuration from the environment.
 * Unset and empty variables are reported together as missing; a
 * non-integer PGPORT is reported as invalid.
 */
export const getPGConfig = (env: Env): E.Either<ConfigError, ClientConfig> =>
  pipe(
    missingKeys(env),
    E.fromPredicate(
      (missing: ReadonlyArray<string>) => missing.length === 0,
      toConfigError("Missing environment variables")
    ),
    E.chain(() =>
      pipe(
        PostgreSQLConfig.decode(env),
        E.mapLeft((errors) =>
          toConfigError("Invalid environment variables")(invalidKeys(errors))
        )
      )
    ),
    E.map((config) => ({
      host: config.PGHOST,
      port: config.PGPORT,
      user: config.PGUSER,
      password: config.PGPASSWORD,
      database: config.PGDATABASE,
    }))
  );
