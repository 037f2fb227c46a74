import {
  DEFAULT_CODEBASE_CANDIDATES,
  config,
  envInfo,
  resolveCodebasePath
} from "../shared/config.js";
import { aggregate } from "../shared/aggregate.js";
import type { DashboardPage } from "../shared/record.js";
import { ExtractionError, extractRecords, readSources, type ExtractionResult, type ExtractionWarning } from "../extractor/extract.js";
import { loadTemplate, renderDashboard, writePage } from "../renderer/render.js";

export type RunOptions = {
  dryRun: boolean;
  codebasePath?: string;
  outputPath: string;
  timeZone: string;
};

export type BuildOptions = RunOptions & {
  now?: Date;
  templatePath?: string;
};

export type BuildResult = {
  codebasePath: string;
  page: DashboardPage;
  warnings: ExtractionWarning[];
  outputPath: string | null;
};

export const parseArgs = (argv: string[]): RunOptions => {
  const args = new Map<string, string | boolean>();
  for (const arg of argv) {
    if (arg === "--dry-run") {
      args.set("dry-run", true);
      continue;
    }
    if (arg.startsWith("--codebase=")) {
      args.set("codebase", arg.slice("--codebase=".length));
      continue;
    }
    if (arg.startsWith("--output=")) {
      args.set("output", arg.slice("--output=".length));
      continue;
    }
    if (arg.startsWith("--timezone=")) {
      args.set("timezone", arg.slice("--timezone=".length));
      continue;
    }
  }

  const stringArg = (key: string) => {
    const value = args.get(key);
    return typeof value === "string" && value ? value : undefined;
  };

  return {
    dryRun: Boolean(args.get("dry-run")),
    codebasePath: stringArg("codebase") ?? (config.codebasePath || undefined),
    outputPath: stringArg("output") ?? config.outputPath,
    timeZone: stringArg("timezone") ?? config.timeZone
  };
};

/**
 * An explicit path must exist; without one the default locations are
 * tried in order.
 */
export const locateCodebase = (explicit: string | undefined): string => {
  const candidates = explicit ? [explicit] : DEFAULT_CODEBASE_CANDIDATES;
  const found = resolveCodebasePath(candidates);
  if (!found) {
    const details = envInfo.envFileExists ? `Check ${envInfo.envFile}.` : `Expected ${envInfo.envFile} (not found).`;
    throw new ExtractionError(
      `No codebase found (tried ${candidates.join(", ")}). Set CODEBASE_PATH or pass --codebase=. ${details}`
    );
  }
  return found;
};

export const formatWarning = (warning: ExtractionWarning) => {
  const where = warning.line === null ? warning.file : `${warning.file}:${warning.line}`;
  if (warning.kind === "template") {
    const subject = warning.id ? `display template ${warning.id}` : "display template";
    return `Ignoring ${subject} (${where}): ${warning.reason}`;
  }
  const subject = warning.id ? `smart fact ${warning.id}` : "smart fact";
  return `Skipping ${subject} (${where}): ${warning.reason}`;
};

export const loadRecords = (codebasePath: string): ExtractionResult => {
  const sources = readSources(codebasePath);
  return extractRecords(sources.definitions, sources.templates);
};

export const runBuild = (options: BuildOptions): BuildResult => {
  console.log("Building Smart Facts dashboard...");

  const codebasePath = locateCodebase(options.codebasePath);
  console.log(`Reading smart facts from ${codebasePath}`);

  const { records, warnings } = loadRecords(codebasePath);
  for (const warning of warnings) {
    console.warn(formatWarning(warning));
  }
  const skipped = warnings.filter((warning) => warning.kind === "definition").length;
  console.log(`Extracted ${records.length} smart facts (${skipped} skipped)`);

  const counts = aggregate(records);
  const page = renderDashboard({
    records,
    counts,
    lastUpdated: options.now ?? new Date(),
    timeZone: options.timeZone,
    template: loadTemplate(options.templatePath)
  });

  if (options.dryRun) {
    console.log(`Dry-run: would write ${options.outputPath} (${page.html.length} bytes)`);
    return { codebasePath, page, warnings, outputPath: null };
  }

  const outputPath = writePage(options.outputPath, page.html);
  console.log(`Wrote ${outputPath}`);
  return { codebasePath, page, warnings, outputPath };
};
