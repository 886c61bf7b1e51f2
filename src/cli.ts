#!/usr/bin/env node

/**
 * CLI entry point for treecopy
 */

import { startTreecopyServer } from "./index";
import { ConfigLoader } from "./lib/ConfigLoader";
import { runCli } from "./lib/CommandRunner";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    stdout: process.stdout,
    stderr: process.stderr,
    loadConfig: () => ConfigLoader.loadConfig(),
    startServer: () => startTreecopyServer(),
  });
}

main().catch((error: unknown) => {
  console.error("treecopy failed:", error);
  process.exit(1);
});
