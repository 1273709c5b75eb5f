#!/usr/bin/env node
/* eslint-disable no-console */
import dotenv from "dotenv";
import * as E from "fp-ts/Either";
import { buildProgram } from "./cli/program";
import { runCommand } from "./cli/dispatcher";
import { pgClientFromConfig } from "./database/postgresql/PostgresOperation";

dotenv.config();

const program = buildProgram((command) =>
  runCommand({
    env: process.env,
    createClient: pgClientFromConfig,
    print: (line) => console.log(line),
    printError: (line) => console.error(line),
  })(command)().then((exitCode) => {
    // eslint-disable-next-line functional/immutable-data
    process.exitCode = exitCode;
  })
);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Unexpected error: ${E.toError(error).message}`);
  // eslint-disable-next-line functional/immutable-data
  process.exitCode = 1;
});
