import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { aggregate } from "../shared/aggregate.js";
import type { SmartFactRecord } from "../shared/record.js";
import {
  RenderError,
  escapeHtml,
  formatLastUpdated,
  renderDashboard,
  toScriptJson,
  typeLabel,
  writePage
} from "./render.js";

const lastUpdated = new Date("2026-10-19T15:04:00Z");

const published: SmartFactRecord = {
  id: "SF-1",
  status: "published",
  type: "home-equity",
  content: "Tap into your equity",
  priority: 1,
  templateKeys: [],
  isDynamic: false,
  cta: null,
  hasCta: false,
  requiredContext: [],
  requiresPrimaryUser: false,
  requiresProfileComplete: false
};

describe("formatLastUpdated", () => {
  it("formats in UTC by default", () => {
    expect(formatLastUpdated(lastUpdated)).toBe("October 19, 2026 at 03:04 PM");
  });

  it("formats in the given time zone", () => {
    expect(formatLastUpdated(lastUpdated, "America/New_York")).toBe("October 19, 2026 at 11:04 AM");
  });
});

describe("escaping", () => {
  it("escapes html", () => {
    expect(escapeHtml(`<a href="x">&'</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&amp;&#39;&lt;/a&gt;");
  });

  it("keeps embedded json from closing the script element", () => {
    expect(toScriptJson("</script><!--")).toBe('"\\u003c/script\\u003e\\u003c!--"');
  });

  it("labels category tags", () => {
    expect(typeLabel("home-equity")).toBe("Home Equity");
  });
});

describe("renderDashboard", () => {
  it("renders a page that names the record and counts it", () => {
    const page = renderDashboard({ records: [published], counts: aggregate([published]), lastUpdated });
    expect(page.html).toContain("SF-1");
    expect(page.html).toContain('data-status-count="published">1</p>');
    expect(page.html).toContain('<option value="home-equity">Home Equity</option>');
    expect(page.html).toContain("Last updated: October 19, 2026 at 03:04 PM");
    expect(page.html).not.toMatch(/\{\{[A-Z_]+\}\}/);
    expect(page.counts.status.published).toBe(1);
  });

  it("renders a well-formed page with zero records", () => {
    const page = renderDashboard({ records: [], counts: aggregate([]), lastUpdated });
    expect(page.html).toContain('<script type="application/json" id="smart-facts-records">[]</script>');
    expect(page.html).toContain('data-status-count="published">0</p>');
    expect(page.html).toContain('"total": 0');
    expect(page.html.trimEnd().endsWith("</html>")).toBe(true);
  });

  it("is deterministic for the same input", () => {
    const input = { records: [published], counts: aggregate([published]), lastUpdated };
    expect(renderDashboard(input).html).toBe(renderDashboard(input).html);
  });

  it("substitutes into a custom template", () => {
    const page = renderDashboard({
      records: [published],
      counts: aggregate([published]),
      lastUpdated,
      template: "<p>{{LAST_UPDATED}}</p>"
    });
    expect(page.html).toBe("<p>October 19, 2026 at 03:04 PM</p>");
  });

  it("rejects unknown placeholders", () => {
    expect(() =>
      renderDashboard({ records: [], counts: aggregate([]), lastUpdated, template: "{{NOPE}}" })
    ).toThrow(new RenderError("Unknown template placeholder {{NOPE}}"));
  });
});

describe("writePage", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "smart-facts-render-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates directories and overwrites the previous page", () => {
    const target = path.join(dir, "site", "index.html");
    writePage(target, "first");
    expect(writePage(target, "second")).toBe(target);
    expect(fs.readFileSync(target, "utf-8")).toBe("second");
    expect(fs.readdirSync(path.join(dir, "site"))).toEqual(["index.html"]);
  });

  it("fails without touching anything when the target cannot be written", () => {
    const blocker = path.join(dir, "blocker");
    fs.writeFileSync(blocker, "not a directory");
    expect(() => writePage(path.join(blocker, "index.html"), "page")).toThrow(RenderError);
    expect(fs.readFileSync(blocker, "utf-8")).toBe("not a directory");
  });
});
