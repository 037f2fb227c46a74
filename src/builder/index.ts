#!/usr/bin/env node
import { parseArgs, runBuild } from "./pipeline.js";

const run = async () => {
  const options = parseArgs(process.argv.slice(2));
  const result = runBuild(options);
  console.log(`Dashboard built with ${result.page.records.length} smart facts`);
};

run().catch((err) => {
  console.error("Dashboard build failed:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
