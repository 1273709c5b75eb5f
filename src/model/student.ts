import * as O from "fp-ts/Option";
import * as t from "io-ts";

export const Student = t.type({
  student_id: t.Int,
  first_name: t.string,
  last_name: t.string,
  email: t.string,
  enrollment_date: t.union([t.string, t.null]),
});

export type Student = t.TypeOf<typeof Student>;

export const InsertedStudent = t.type({
  student_id: t.Int,
});

export type InsertedStudent = t.TypeOf<typeof InsertedStudent>;

export type NewStudent = {
  readonly firstName: string;
  readonly lastName: string;
  readonly email: string;
  readonly enrollmentDate: O.Option<string>;
};
