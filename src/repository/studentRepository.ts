import * as E from "fp-ts/Either";
import * as O from "fp-ts/Option";
import * as RA from "fp-ts/ReadonlyArray";
import * as RTE from "fp-ts/ReaderTaskEither";
import { pipe } from "fp-ts/lib/function";
import * as t from "io-ts";
import type { DatabaseDeps } from "../config/deps";
import { query } from "../database/postgresql/PostgresPg";
import { type AppError, unexpectedError } from "../model/errors";
import { InsertedStudent, type NewStudent, Student } from "../model/student";
import { QUERIES } from "../utilities/query";

const decodeRows =
  <A>(codec: t.Decoder<unknown, A>, what: string) =>
  (rows: unknown): E.Either<AppError, A> =>
    pipe(
      codec.decode(rows),
      E.mapLeft(() =>
        unexpectedError(`Unexpected ${what} returned by PostgreSQL`)
      )
    );

const affectedRows = (rowCount: number | null): number => rowCount ?? 0;

export const getAllStudents: RTE.ReaderTaskEither<
  DatabaseDeps,
  AppError,
  ReadonlyArray<Student>
> = pipe(
  query(QUERIES.SELECT_ALL_STUDENTS),
  RTE.chainEitherK(({ rows }) =>
    decodeRows(t.readonlyArray(Student), "student rows")(rows)
  )
);

/**
 * Inserts a student and returns the identifier generated by the table.
 * A duplicate email fails with `UniqueViolation`.
 */
export const addStudent = (
  student: NewStudent
): RTE.ReaderTaskEither<DatabaseDeps, AppError, number> =>
  pipe(
    query(QUERIES.INSERT_STUDENT, [
      student.firstName,
      student.lastName,
      student.email,
      O.toNullable(student.enrollmentDate),
    ]),
    RTE.chainEitherK(({ rows }) =>
      pipe(
        RA.head(rows),
        E.fromOption(() => unexpectedError("INSERT returned no student_id")),
        E.chain(decodeRows(InsertedStudent, "student_id"))
      )
    ),
    RTE.map(({ student_id }) => student_id)
  );

/**
 * Returns the number of updated rows: 0 when no student has the id.
 */
export const updateStudentEmail = (
  studentId: number,
  email: string
): RTE.ReaderTaskEither<DatabaseDeps, AppError, number> =>
  pipe(
    query(QUERIES.UPDATE_STUDENT_EMAIL, [email, studentId]),
    RTE.map(({ rowCount }) => affectedRows(rowCount))
  );

export const deleteStudent = (
  studentId: number
): RTE.ReaderTaskEither<DatabaseDeps, AppError, number> =>
  pipe(
    query(QUERIES.DELETE_STUDENT, [studentId]),
    RTE.map(({ rowCount }) => affectedRows(rowCount))
  );
