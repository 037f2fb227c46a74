import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { SMART_FACT_STATUSES, type AggregateCounts, type DashboardPage, type SmartFactRecord, type SmartFactStatus } from "../shared/record.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_TEMPLATE_PATH = path.resolve(__dirname, "..", "..", "templates", "dashboard.html");

export class RenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RenderError";
  }
}

export type RenderInput = {
  records: SmartFactRecord[];
  counts: AggregateCounts;
  lastUpdated: Date;
  timeZone?: string;
  template?: string;
};

export const STATUS_LABELS: Record<SmartFactStatus, string> = {
  candidate: "Candidate",
  draft: "Draft",
  review: "Under Review",
  published: "Published",
  live: "Live",
  retired: "Retired",
  archived: "Archived"
};

export const escapeHtml = (value: string) =>
  value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");

/**
 * JSON that is safe inside a <script> element: nothing in the data can
 * close the element or open a comment.
 */
export const toScriptJson = (value: unknown) =>
  JSON.stringify(value, null, 2)
    .replace(/</g, "\\u003c")
    .replace(/>/g, "\\u003e")
    .replace(/&/g, "\\u0026")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");

export const typeLabel = (type: string) =>
  type
    .split("-")
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1) : word))
    .join(" ");

// "October 19, 2026 at 03:04 PM"
export const formatLastUpdated = (date: Date, timeZone = "UTC") => {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "long",
    day: "numeric",
    hour: "2-digit",
    minute: "2-digit",
    hour12: true
  }).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((entry) => entry.type === type)?.value ?? "";
  return `${part("month")} ${part("day")}, ${part("year")} at ${part("hour")}:${part("minute")} ${part("dayPeriod")}`;
};

const statusOptions = () =>
  SMART_FACT_STATUSES.map(
    (status) => `<option value="${status}">${escapeHtml(STATUS_LABELS[status])}</option>`
  ).join("\n");

const typeOptions = (counts: AggregateCounts) =>
  Object.keys(counts.type)
    .map((type) => `<option value="${escapeHtml(type)}">${escapeHtml(typeLabel(type))}</option>`)
    .join("\n");

const statusCards = (counts: AggregateCounts) =>
  SMART_FACT_STATUSES.map(
    (status) => `<div class="bg-white rounded-lg shadow-sm p-4">
  <p class="text-sm font-medium text-gray-600">${escapeHtml(STATUS_LABELS[status])}</p>
  <p class="text-2xl font-semibold text-gray-900" data-status-count="${status}">${counts.status[status]}</p>
</div>`
  ).join("\n");

export const loadTemplate = (templatePath = DEFAULT_TEMPLATE_PATH) => {
  try {
    return fs.readFileSync(templatePath, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RenderError(`Cannot read dashboard template ${templatePath}: ${message}`);
  }
};

export const renderDashboard = (input: RenderInput): DashboardPage => {
  const template = input.template ?? loadTemplate();
  const lastUpdated = formatLastUpdated(input.lastUpdated, input.timeZone);

  const values: Record<string, string> = {
    LAST_UPDATED: escapeHtml(lastUpdated),
    RECORDS_JSON: toScriptJson(input.records),
    COUNTS_JSON: toScriptJson(input.counts),
    STATUS_OPTIONS: statusOptions(),
    TYPE_OPTIONS: typeOptions(input.counts),
    STATUS_CARDS: statusCards(input.counts)
  };

  const html = template.replace(/\{\{([A-Z_]+)\}\}/g, (whole, key: string) => {
    const value = values[key];
    if (value === undefined) {
      throw new RenderError(`Unknown template placeholder ${whole}`);
    }
    return value;
  });

  return {
    html,
    records: input.records,
    counts: input.counts,
    lastUpdated
  };
};

/**
 * Replaces `outputPath` in one step: the page is written beside it and
 * renamed over it, so a failed write leaves the previous page in place.
 */
export const writePage = (outputPath: string, html: string) => {
  const target = path.resolve(outputPath);
  const tempPath = `${target}.${process.pid}.tmp`;
  try {
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(tempPath, html, "utf-8");
    fs.renameSync(tempPath, target);
  } catch (error) {
    if (fs.existsSync(tempPath)) {
      fs.rmSync(tempPath);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new RenderError(`Cannot write ${target}: ${message}`);
  }
  return target;
};
