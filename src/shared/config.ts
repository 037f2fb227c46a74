import fs from "fs";
import path from "path";
import dotenv from "dotenv";

const isProdEnv = process.env.DASHBOARD_ENV === "prod" || process.env.NODE_ENV === "production";
const envFile = isProdEnv ? ".env.prod" : ".env.dev";
const envPath = path.resolve(process.cwd(), envFile);
const envFileExists = fs.existsSync(envPath);

if (envFileExists) {
  dotenv.config({ path: envPath });
}

export const envInfo = {
  envFile,
  envPath,
  envFileExists
};

export const DEFINITIONS_FILE = path.join("apps", "smart_facts", "definitions.py");
export const TEMPLATES_FILE = path.join("apps", "smart_facts", "display_templates.py");

export const DEFAULT_CODEBASE_CANDIDATES = ["../codebase", "../../codebase", "/tmp/codebase"];

const requiredEnv = (key: string): string => {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required env var: ${key}`);
  }
  return value;
};

export const resolveCodebasePath = (
  candidates: Array<string | undefined>,
  exists: (candidate: string) => boolean = fs.existsSync
): string | null => {
  for (const candidate of candidates) {
    if (candidate && exists(candidate)) {
      return path.resolve(candidate);
    }
  }
  return null;
};

export const config = {
  codebasePath: process.env.CODEBASE_PATH ?? "",
  outputPath: process.env.DASHBOARD_OUTPUT ?? "index.html",
  timeZone: process.env.DASHBOARD_TIMEZONE ?? "UTC",
  port: Number(process.env.PORT ?? 3000),
  dispatchEvent: process.env.DASHBOARD_DISPATCH_EVENT ?? "rebuild-dashboard",
  githubApiUrl: process.env.GITHUB_API_URL ?? "https://api.github.com",
  requireEnv: requiredEnv
};
