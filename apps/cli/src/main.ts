#!/usr/bin/env node
import { describeError } from "@passdeck/core-application";

import { createInterface } from "./program";

async function main(): Promise<void> {
  const program = createInterface();
  await program.parseAsync(process.argv);
}

main().catch((err) => {
  console.error(describeError(err));
  process.exitCode = 1;
});
