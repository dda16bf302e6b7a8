#!/usr/bin/env node
import { buildProgram } from "./cli.js";
import { TablewalkError, errorMessage } from "./errors.js";
import { closeLogger, rootLogger } from "./logger.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((e: unknown) => {
    rootLogger.error("command failed", { error: errorMessage(e) });
    console.error(e instanceof TablewalkError ? errorMessage(e) : `Error: ${errorMessage(e)}`);
    process.exitCode = 1;
  })
  .finally(closeLogger)
  .catch((e: unknown) => {
    console.error(`Error: could not close the log: ${errorMessage(e)}`);
  });
