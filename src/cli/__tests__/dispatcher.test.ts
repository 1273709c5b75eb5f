import * as O from "fp-ts/Option";
import { type Mock, beforeEach, describe, expect, it, vi } from "vitest";
import { InMemoryStudents } from "../../database/postgresql/__tests__/inMemoryStudents";
import { formatTable } from "../../output/table";
import type { StudentCommand } from "../command";
import { type DispatchDeps, runCommand } from "../dispatcher";

const env = {
  PGHOST: "localhost",
  PGPORT: "5432",
  PGUSER: "postgres",
  PGPASSWORD: "test-secret",
  PGDATABASE: "school",
};

const addAda: StudentCommand = {
  _tag: "Add",
  student: {
    firstName: "Ada",
    lastName: "Lovelace",
    email: "ada@example.com",
    enrollmentDate: O.some("2023-09-03"),
  },
};

describe("runCommand", () => {
  let db: InMemoryStudents;
  let deps: DispatchDeps;
  let print: Mock<(line: string) => void>;
  let printError: Mock<(line: string) => void>;

  const printed = () => print.mock.calls.map(([line]) => line);

  beforeEach(() => {
    db = new InMemoryStudents();
    print = vi.fn<(line: string) => void>();
    printError = vi.fn<(line: string) => void>();
    deps = { env, createClient: db.factory, print, printError };
  });

  describe("configuration", () => {
    it("should abort before connecting when a variable is missing", async () => {
      const exitCode = await runCommand({
        ...deps,
        env: { ...env, PGUSER: undefined },
      })({ _tag: "ListAll" })();

      expect(exitCode).toBe(1);
      expect(printError).toHaveBeenCalledWith(
        "Missing environment variables: PGUSER. Copy .env.example to .env and fill in your credentials."
      );
      expect(print).not.toHaveBeenCalled();
      expect(db.created).toBe(0);
    });

    it("should abort before connecting when the port is not a number", async () => {
      const exitCode = await runCommand({
        ...deps,
        env: { ...env, PGPORT: "postgres" },
      })(addAda)();

      expect(exitCode).toBe(1);
      expect(db.created).toBe(0);
      expect(db.all()).toEqual([]);
    });
  });

  describe("list-all", () => {
    it("should print the placeholder for an empty table", async () => {
      const exitCode = await runCommand(deps)({ _tag: "ListAll" })();

      expect(exitCode).toBe(0);
      expect(printed()).toEqual(["(no rows)"]);
      expect(db.created).toBe(1);
      expect(db.ended).toBe(1);
    });

    it("should print every student", async () => {
      db.seed({
        first_name: "John",
        last_name: "Doe",
        email: "john.doe@example.com",
        enrollment_date: "2023-09-01",
      });

      await runCommand(deps)({ _tag: "ListAll" })();

      expect(printed()).toEqual([formatTable(db.all())]);
    });
  });

  describe("add", () => {
    it("should print the new id and the refreshed list", async () => {
      const exitCode = await runCommand(deps)(addAda)();

      expect(exitCode).toBe(0);
      expect(printed()).toEqual([
        "Inserted student_id=1",
        [
          "| student_id | first_name | last_name | email           | enrollment_date |",
          "|------------|------------|-----------|-----------------|-----------------|",
          "|          1 | Ada        | Lovelace  | ada@example.com | 2023-09-03      |",
        ].join("\n"),
      ]);
    });

    it("should open one connection for the insert and one for the list", async () => {
      await runCommand(deps)(addAda)();

      expect(db.created).toBe(2);
      expect(db.ended).toBe(2);
    });

    it("should report a duplicate email and exit normally", async () => {
      await runCommand(deps)(addAda)();
      print.mockClear();

      const exitCode = await runCommand(deps)(addAda)();

      expect(exitCode).toBe(0);
      expect(printed()).toEqual([
        "Error: Email must be unique. Choose a different email.",
      ]);
      expect(db.all()).toHaveLength(1);
    });
  });

  describe("update-email", () => {
    it("should confirm the update", async () => {
      await runCommand(deps)(addAda)();
      print.mockClear();

      await runCommand(deps)({
        _tag: "UpdateEmail",
        id: "1",
        email: "countess@example.com",
      })();

      expect(printed()[0]).toBe("Updated email for student_id=1");
      expect(printed()[1]).toBe(formatTable(db.all()));
      expect(db.all()[0].email).toBe("countess@example.com");
    });

    it("should report an unknown id as not found", async () => {
      const exitCode = await runCommand(deps)({
        _tag: "UpdateEmail",
        id: "9",
        email: "nobody@example.com",
      })();

      expect(exitCode).toBe(0);
      expect(printed()).toEqual(["No student found with id 9", "(no rows)"]);
    });

    it.each(["abc", "0x10", "1e1"])(
      "should report the malformed id %j without connecting",
      async (id) => {
        const exitCode = await runCommand(deps)({
          _tag: "UpdateEmail",
          id,
          email: "c@d.com",
        })();

        expect(exitCode).toBe(0);
        expect(printed()).toEqual([
          `Unexpected error: invalid student id "${id}"`,
        ]);
        expect(db.created).toBe(0);
      }
    );

    it("should report an email taken by another student without re-listing", async () => {
      await runCommand(deps)(addAda)();
      await runCommand(deps)({
        _tag: "Add",
        student: {
          firstName: "Grace",
          lastName: "Hopper",
          email: "grace@example.com",
          enrollmentDate: O.none,
        },
      })();
      print.mockClear();

      const exitCode = await runCommand(deps)({
        _tag: "UpdateEmail",
        id: "2",
        email: "ada@example.com",
      })();

      expect(exitCode).toBe(0);
      expect(printed()).toEqual([
        "Error: Email must be unique. Choose a different email.",
      ]);
      expect(db.all()[1].email).toBe("grace@example.com");
    });
  });

  describe("delete", () => {
    it("should confirm the deletion", async () => {
      await runCommand(deps)(addAda)();
      print.mockClear();

      await runCommand(deps)({ _tag: "Delete", id: "1" })();

      expect(printed()).toEqual(["Deleted student_id=1", "(no rows)"]);
    });

    it.each(["0x10", "1e1"])(
      "should not delete anything for the id %j",
      async (id) => {
        for (let n = 1; n <= 16; n += 1) {
          db.seed({
            first_name: "Student",
            last_name: `${n}`,
            email: `student${n}@example.com`,
            enrollment_date: null,
          });
        }

        await runCommand(deps)({ _tag: "Delete", id })();

        expect(printed()).toEqual([
          `Unexpected error: invalid student id "${id}"`,
        ]);
        expect(db.all()).toHaveLength(16);
      }
    );

    it("should report an unknown id as not found", async () => {
      await runCommand(deps)(addAda)();
      print.mockClear();

      await runCommand(deps)({ _tag: "Delete", id: "2" })();

      expect(printed()[0]).toBe("No student found with id 2");
      expect(db.all()).toHaveLength(1);
    });
  });

  it("should report a connection failure as an unexpected error", async () => {
    db.connectError = new Error("connect ECONNREFUSED 127.0.0.1:5432");

    const exitCode = await runCommand(deps)({ _tag: "ListAll" })();

    expect(exitCode).toBe(0);
    expect(printed()).toEqual([
      "Unexpected error: connect ECONNREFUSED 127.0.0.1:5432",
    ]);
  });
});
