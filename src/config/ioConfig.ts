import * as t from "io-ts";
import * as ts from "io-ts-types";
import { DecimalIntFromString } from "../utilities/codecs";

export const PostgreSQLConfig = t.type({
  PGHOST: ts.NonEmptyString,
  PGPORT: DecimalIntFromString,
  PGUSER: ts.NonEmptyString,
  PGPASSWORD: ts.NonEmptyString,
  PGDATABASE: ts.NonEmptyString,
});

export type PostgreSQLConfig = t.TypeOf<typeof PostgreSQLConfig>;
