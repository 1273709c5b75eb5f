import * as E from "fp-ts/Either";
import * as O from "fp-ts/Option";
import * as T from "fp-ts/Task";
import * as TE from "fp-ts/TaskEither";
import { flow, pipe } from "fp-ts/lib/function";
import type { ClientConfig } from "pg";
import { type Env, getPGConfig } from "../config/config";
import {
  type PGClientFactory,
  withPGClient,
} from "../database/postgresql/PostgresOperation";
import { type AppError, unexpectedError } from "../model/errors";
import { formatTable } from "../output/table";
import {
  addStudent,
  deleteStudent,
  getAllStudents,
  updateStudentEmail,
} from "../repository/studentRepository";
import { DecimalIntFromString } from "../utilities/codecs";
import type { StudentCommand } from "./command";

export type ExitCode = 0 | 1;

export interface DispatchDeps {
  readonly env: Env;
  readonly createClient: PGClientFactory;
  readonly print: (line: string) => void;
  readonly printError: (line: string) => void;
}

export const UNIQUE_EMAIL_MESSAGE =
  "Error: Email must be unique. Choose a different email.";

const decodeStudentId = (raw: string): E.Either<AppError, number> =>
  pipe(
    DecimalIntFromString.decode(raw),
    E.mapLeft(() => unexpectedError(`invalid student id "${raw}"`))
  );

const notFound = (id: number): string => `No student found with id ${id}`;

const reportAffected =
  (id: number, done: string) =>
  (affected: number): string =>
    affected === 0 ? notFound(id) : done;

export const describeError = (error: AppError): string => {
  switch (error.kind) {
    case "UniqueViolation":
      return UNIQUE_EMAIL_MESSAGE;
    case "ConfigError":
    case "UnexpectedError":
      return `Unexpected error: ${error.message}`;
  }
};

/**
 * Runs the repository operation behind a command on its own connection.
 * Resolves to the one-line summary to print, if the command has one.
 */
const execute = (
  config: ClientConfig,
  createClient: PGClientFactory,
  command: StudentCommand
): TE.TaskEither<AppError, O.Option<string>> => {
  const run = withPGClient(config, createClient);
  switch (command._tag) {
    case "ListAll":
      return TE.right(O.none);
    case "Add":
      return pipe(
        run(addStudent(command.student)),
        TE.map((id) => O.some(`Inserted student_id=${id}`))
      );
    case "UpdateEmail":
      return pipe(
        TE.fromEither(decodeStudentId(command.id)),
        TE.chain((id) =>
          pipe(
            run(updateStudentEmail(id, command.email)),
            TE.map(
              flow(
                reportAffected(id, `Updated email for student_id=${id}`),
                O.some
              )
            )
          )
        )
      );
    case "Delete":
      return pipe(
        TE.fromEither(decodeStudentId(command.id)),
        TE.chain((id) =>
          pipe(
            run(deleteStudent(id)),
            TE.map(
              flow(reportAffected(id, `Deleted student_id=${id}`), O.some)
            )
          )
        )
      );
  }
};

const dispatch =
  (deps: DispatchDeps, config: ClientConfig) =>
  (command: StudentCommand): T.Task<void> =>
    pipe(
      execute(config, deps.createClient, command),
      TE.chainFirstIOK(
        (summary) => () => pipe(summary, O.map(deps.print))
      ),
      TE.chain(() => withPGClient(config, deps.createClient)(getAllStudents)),
      TE.match(
        (error) => deps.print(describeError(error)),
        (students) => deps.print(formatTable(students))
      )
    );

/**
 * Loads the configuration, then executes the command and reprints every
 * student. Only a configuration error yields a non-zero exit code; it is
 * reported before any connection is opened.
 */
export const runCommand =
  (deps: DispatchDeps) =>
  (command: StudentCommand): T.Task<ExitCode> =>
    pipe(
      getPGConfig(deps.env),
      E.match(
        (error) =>
          pipe(
            T.fromIO(() => deps.printError(error.message)),
            T.map((): ExitCode => 1)
          ),
        (config) =>
          pipe(
            dispatch(deps, config)(command),
            T.map((): ExitCode => 0)
          )
      )
    );
