#!/usr/bin/env node
import { main } from "./cli";
import * as logger from "./lib/logger";

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    logger.error(e);
    process.exitCode = 1;
  },
);
