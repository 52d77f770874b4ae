#!/usr/bin/env node
import { BlockpatchEntrypoint } from "./BlockpatchEntrypoint.js";

BlockpatchEntrypoint.run().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
