import fs from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ExtractionError } from "../extractor/extract.js";
import { formatWarning, locateCodebase, parseArgs, runBuild } from "./pipeline.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const fixtureCodebase = path.resolve(__dirname, "..", "..", "test", "fixtures", "codebase");
const now = new Date("2026-10-19T15:04:00Z");

describe("parseArgs", () => {
  it("reads flags", () => {
    expect(
      parseArgs(["--dry-run", "--codebase=/src/app", "--output=site/index.html", "--timezone=Europe/London"])
    ).toEqual({
      dryRun: true,
      codebasePath: "/src/app",
      outputPath: "site/index.html",
      timeZone: "Europe/London"
    });
  });
});

describe("formatWarning", () => {
  it("names the record and where it was found", () => {
    expect(
      formatWarning({ kind: "definition", file: "definitions.py", line: 51, id: "SF-5", reason: "status is missing" })
    ).toBe("Skipping smart fact SF-5 (definitions.py:51): status is missing");
    expect(formatWarning({ kind: "definition", file: "definitions.py", line: null, id: null, reason: "bad entry" })).toBe(
      "Skipping smart fact (definitions.py): bad entry"
    );
  });

  it("labels display template entries separately", () => {
    expect(formatWarning({ kind: "template", file: "display_templates.py", line: 3, id: "SF-9", reason: "bad entry" })).toBe(
      "Ignoring display template SF-9 (display_templates.py:3): bad entry"
    );
  });
});

describe("locateCodebase", () => {
  it("requires an explicit path to exist", () => {
    expect(locateCodebase(fixtureCodebase)).toBe(fixtureCodebase);
    expect(() => locateCodebase(path.join(fixtureCodebase, "nope"))).toThrow(ExtractionError);
  });
});

describe("runBuild", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "smart-facts-build-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("extracts, aggregates and writes the dashboard", () => {
    const outputPath = path.join(dir, "index.html");
    const result = runBuild({ codebasePath: fixtureCodebase, outputPath, dryRun: false, timeZone: "UTC", now });

    expect(result.outputPath).toBe(outputPath);
    expect(result.page.counts.total).toBe(3);
    expect(result.page.counts.status).toMatchObject({ published: 1, candidate: 1, archived: 1 });
    expect(result.page.counts.type).toEqual({ "home-equity": 2, "market-trends": 1 });

    const html = fs.readFileSync(outputPath, "utf-8");
    expect(html).toBe(result.page.html);
    expect(html).toContain("SF-2");
    expect(console.warn).toHaveBeenCalledTimes(3);
    expect(console.log).toHaveBeenCalledWith("Extracted 3 smart facts (3 skipped)");
  });

  it("does not count ignored display templates as skipped smart facts", () => {
    const codebase = path.join(dir, "codebase");
    const smartFacts = path.join(codebase, "apps", "smart_facts");
    fs.mkdirSync(smartFacts, { recursive: true });
    fs.writeFileSync(path.join(smartFacts, "definitions.py"), 'SmartFactDefinition(id="A", status="live")\n');
    fs.writeFileSync(path.join(smartFacts, "display_templates.py"), 'DISPLAY_TEMPLATES = {"A": "a", "B": 3}\n');

    const result = runBuild({ codebasePath: codebase, outputPath: path.join(dir, "index.html"), dryRun: true, timeZone: "UTC", now });

    expect(result.page.records.map((record) => record.id)).toEqual(["A"]);
    expect(console.warn).toHaveBeenCalledWith(
      `Ignoring display template B (${path.join("apps", "smart_facts", "display_templates.py")}:1): display template entry is not a string keyed to a string`
    );
    expect(console.log).toHaveBeenCalledWith("Extracted 1 smart facts (0 skipped)");
  });

  it("gives identical output for unchanged input", () => {
    const first = runBuild({ codebasePath: fixtureCodebase, outputPath: path.join(dir, "a.html"), dryRun: false, timeZone: "UTC", now });
    const second = runBuild({ codebasePath: fixtureCodebase, outputPath: path.join(dir, "b.html"), dryRun: false, timeZone: "UTC", now });
    expect(JSON.stringify(second.page.counts)).toBe(JSON.stringify(first.page.counts));
    expect(fs.readFileSync(path.join(dir, "b.html"), "utf-8")).toBe(fs.readFileSync(path.join(dir, "a.html"), "utf-8"));
  });

  it("writes nothing on a dry run", () => {
    const outputPath = path.join(dir, "index.html");
    const result = runBuild({ codebasePath: fixtureCodebase, outputPath, dryRun: true, timeZone: "UTC", now });
    expect(result.outputPath).toBeNull();
    expect(fs.existsSync(outputPath)).toBe(false);
  });

  it("leaves the previous page in place when the input is unreadable", () => {
    const outputPath = path.join(dir, "index.html");
    fs.writeFileSync(outputPath, "previous");
    const emptyCodebase = path.join(dir, "codebase");
    fs.mkdirSync(emptyCodebase);

    expect(() =>
      runBuild({ codebasePath: emptyCodebase, outputPath, dryRun: false, timeZone: "UTC", now })
    ).toThrow(ExtractionError);
    expect(fs.readFileSync(outputPath, "utf-8")).toBe("previous");
  });
});
