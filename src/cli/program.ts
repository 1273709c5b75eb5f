/**
 * commander program for the students CLI.
 * Defines the subcommands and their options, and hands each parsed
 * invocation to the caller as a `StudentCommand`.
 */

import { Command } from "commander";
import * as O from "fp-ts/Option";
import type { StudentCommand } from "./command";

type AddOptions = {
  first: string;
  last: string;
  email: string;
  date?: string;
};

type UpdateEmailOptions = {
  id: string;
  email: string;
};

type DeleteOptions = {
  id: string;
};

export type CommandHandler = (command: StudentCommand) => Promise<void>;

/**
 * Registers the subcommands on `program`. Settings such as `exitOverride`
 * must be applied to `program` beforehand for the subcommands to inherit
 * them.
 */
export const buildProgram = (
  handle: CommandHandler,
  program: Command = new Command()
): Command => {
  program
    .name("students")
    .description("PostgreSQL CRUD app for the `students` table");

  program
    .command("list-all")
    .alias("get-all")
    .description("Retrieve and display all students")
    .action(() => handle({ _tag: "ListAll" }));

  program
    .command("add")
    .description("Insert a new student")
    .requiredOption("--first <name>", "First name")
    .requiredOption("--last <name>", "Last name")
    .requiredOption("--email <email>", "Email (must be unique)")
    .option("--date <date>", "Enrollment date (YYYY-MM-DD)")
    .action((options: AddOptions) =>
      handle({
        _tag: "Add",
        student: {
          firstName: options.first,
          lastName: options.last,
          email: options.email,
          enrollmentDate: O.fromNullable(options.date),
        },
      })
    );

  program
    .command("update-email")
    .description("Update a student's email by id")
    .requiredOption("--id <id>", "Student ID")
    .requiredOption("--email <email>", "New email")
    .action((options: UpdateEmailOptions) =>
      handle({ _tag: "UpdateEmail", id: options.id, email: options.email })
    );

  program
    .command("delete")
    .description("Delete a student by id")
    .requiredOption("--id <id>", "Student ID")
    .action((options: DeleteOptions) =>
      handle({ _tag: "Delete", id: options.id })
    );

  return program;
};
