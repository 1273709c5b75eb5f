import * as E from "fp-ts/Either";
import { pipe } from "fp-ts/lib/function";
import * as t from "io-ts";
import * as ts from "io-ts-types";

const DECIMAL_INTEGER = /^\s*[+-]?\d+\s*$/;

/**
 * `IntFromString` restricted to base-10 digits: hex (`0x10`) and exponent
 * (`1e1`) forms are rejected instead of converted.
 */
export const DecimalIntFromString = new t.Type<t.Int, string, unknown>(
  "DecimalIntFromString",
  t.Int.is,
  (u, c) =>
    pipe(
      t.string.validate(u, c),
      E.chain((s) =>
        DECIMAL_INTEGER.test(s)
          ? ts.IntFromString.validate(s, c)
          : t.failure<t.Int>(u, c)
      )
    ),
  ts.IntFromString.encode
);
