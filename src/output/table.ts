/**
 * Text table for CLI output, laid out like a GitHub markdown table.
 */

import * as O from "fp-ts/Option";
import * as RA from "fp-ts/ReadonlyArray";
import { pipe } from "fp-ts/lib/function";

export const EMPTY_TABLE = "(no rows)";

type Row = Readonly<Record<string, unknown>>;

const formatCell = (value: unknown): string =>
  value === null || value === undefined ? "" : String(value);

// a column holding only numbers (and blanks) is right-aligned
const isNumericColumn = (
  rows: ReadonlyArray<Row>,
  header: string
): boolean => {
  const values = rows
    .map((row) => row[header])
    .filter((value) => value !== null && value !== undefined);
  return (
    values.length > 0 && values.every((value) => typeof value === "number")
  );
};

const renderTable = (
  headers: ReadonlyArray<string>,
  rows: ReadonlyArray<Row>
): string => {
  const cells = rows.map((row) =>
    headers.map((header) => formatCell(row[header]))
  );

  const widths = headers.map((header, i) =>
    cells.reduce((max, row) => Math.max(max, row[i].length), header.length)
  );

  const numeric = headers.map((header) => isNumericColumn(rows, header));

  const pad = (text: string, i: number): string =>
    numeric[i] ? text.padStart(widths[i]) : text.padEnd(widths[i]);

  const line = (row: ReadonlyArray<string>): string =>
    `| ${row.map(pad).join(" | ")} |`;

  const separator = `|${widths.map((w) => "-".repeat(w + 2)).join("|")}|`;

  return [line(headers), separator, ...cells.map(line)].join("\n");
};

/**
 * Formats records as an aligned table, headed by the first record's keys.
 *
 * @returns the table, or {@link EMPTY_TABLE} when there are no records
 */
export const formatTable = (rows: ReadonlyArray<Row>): string =>
  pipe(
    RA.head(rows),
    O.fold(
      () => EMPTY_TABLE,
      (first) => renderTable(Object.keys(first), rows)
    )
  );
