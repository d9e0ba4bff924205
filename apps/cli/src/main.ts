#!/usr/bin/env node
import { createLogger } from "@countme/logger";
import { runCli } from "./cli.js";

const log = createLogger("countme");

runCli()
  .then(({ exitCode }) => {
    process.exitCode = exitCode;
  })
  .catch((err) => {
    log.fatal("Unexpected error:", err);
    process.exitCode = 1;
  });
