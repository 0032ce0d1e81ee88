#!/usr/bin/env node
import { program } from "./cli";
import { logger } from "./utils/logger";

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error("Unexpected failure", error);
  process.exitCode = 1;
});
