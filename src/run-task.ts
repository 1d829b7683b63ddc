#!/usr/bin/env node
import { fileURLToPath } from "node:url";

import { buildProgram } from "./cli/program.js";
import { formatError } from "./lib/errors.js";

const program = buildProgram({ scriptPath: fileURLToPath(import.meta.url) });

void program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`${formatError(error)}\n`);
  process.exitCode = 1;
});
