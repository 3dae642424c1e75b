#!/usr/bin/env node
import "dotenv/config";

import { createProgram } from "./program.js";

const main = async () => {
  await createProgram().parseAsync(process.argv);
};

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
