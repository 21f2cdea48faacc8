#!/usr/bin/env node
import { loadTemporalEnv } from "./config.js";
import { EXIT_FAILURE, runCli } from "./cli.js";

async function main(): Promise<number> {
  try {
    return await runCli(process.argv.slice(2), loadTemporalEnv());
  } catch (err) {
    console.error("Fatal:", err instanceof Error ? err.message : err);
    return EXIT_FAILURE;
  }
}

main().then((code) => process.exit(code));
