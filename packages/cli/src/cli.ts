#!/usr/bin/env node
import { runScenecastCli } from "./scenecastCli.js";

async function main() {
  process.exitCode = await runScenecastCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`scenecast failed: ${message}\n`);
  process.exitCode = 1;
});
