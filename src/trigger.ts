import { config } from "./shared/config.js";
import { triggerRebuild } from "./shared/dispatch.js";

const run = async () => {
  const reasonArg = process.argv.slice(2).find((arg) => arg.startsWith("--reason="));
  const url = await triggerRebuild({
    token: config.requireEnv("DASHBOARD_TOKEN"),
    repo: config.requireEnv("DASHBOARD_REPO"),
    eventType: config.dispatchEvent,
    apiUrl: config.githubApiUrl,
    reason: reasonArg ? reasonArg.slice("--reason=".length) : undefined
  });
  console.log(`Rebuild requested via ${url}`);
};

run().catch((error) => {
  console.error("Trigger failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
