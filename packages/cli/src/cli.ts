#!/usr/bin/env node
import { run } from "./run.js";

run(process.argv.slice(2)).catch((error: unknown) => {
  console.error(`[litekit] ${error instanceof Error ? error.message : String(error)}`);
  if (error instanceof Error && typeof error.stack === "string" && error.stack.trim()) {
    console.error(error.stack);
  }
  process.exit(1);
});
