import * as E from "fp-ts/Either";

export type ConfigError = {
  readonly kind: "ConfigError";
  readonly keys: ReadonlyArray<string>;
  readonly message: string;
};

export type UniqueViolation = {
  readonly kind: "UniqueViolation";
  readonly message: string;
};

export type UnexpectedError = {
  readonly kind: "UnexpectedError";
  readonly message: string;
};

export type AppError = ConfigError | UniqueViolation | UnexpectedError;

export const UNIQUE_VIOLATION_SQLSTATE = "23505";

// node-postgres DatabaseError carries the SQLSTATE in `code`
const isUniqueViolation = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  error.code === UNIQUE_VIOLATION_SQLSTATE;

export const configError = (
  keys: ReadonlyArray<string>,
  message: string
): ConfigError => ({ kind: "ConfigError", keys, message });

export const uniqueViolation = (message: string): UniqueViolation => ({
  kind: "UniqueViolation",
  message,
});

export const unexpectedError = (message: string): UnexpectedError => ({
  kind: "UnexpectedError",
  message,
});

export const fromDatabaseError = (error: unknown): AppError =>
  isUniqueViolation(error)
    ? uniqueViolation(E.toError(error).message)
    : unexpectedError(E.toError(error).message);
