#!/usr/bin/env node
import { runCli } from "./cli.js";
import { logger } from "./lib/utils/logger.js";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error("Unhandled error in main", { error: String(error) });
    process.exitCode = 1;
  });
