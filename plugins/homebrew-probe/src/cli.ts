#!/usr/bin/env node

import { runCli } from "./cli/main.js";
import { logger } from "./logger.js";

runCli(process.argv.slice(2), {
  env: process.env,
  stdout: (text) => process.stdout.write(text),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.fatal({ error: err instanceof Error ? err.message : String(err) }, "Fatal error");
    process.exit(1);
  });
