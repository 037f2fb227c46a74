import type { SmartFactRecord } from "./record.js";

const yesNo = (value: boolean) => (value ? "Yes" : "No");

export const CSV_COLUMNS: Array<[string, (record: SmartFactRecord) => string]> = [
  ["ID", (record) => record.id],
  ["Status", (record) => record.status],
  ["Type", (record) => record.type],
  ["Kind", (record) => (record.isDynamic ? "Dynamic" : "Static")],
  ["Priority", (record) => (record.priority === null ? "" : String(record.priority))],
  ["Content", (record) => record.content.replace(/\n/g, " ").replace(/\r/g, "")],
  ["Dynamic Variables", (record) => record.templateKeys.join("; ")],
  ["CTA Text", (record) => record.cta?.text ?? ""],
  ["CTA URL", (record) => record.cta?.url ?? ""],
  ["Required Context", (record) => record.requiredContext.join("; ")],
  ["Requires Primary User", (record) => yesNo(record.requiresPrimaryUser)],
  ["Requires Profile Complete", (record) => yesNo(record.requiresProfileComplete)],
  ["Has CTA", (record) => yesNo(record.hasCta)]
];

export const escapeCsvField = (value: string) =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

export const toCsv = (records: SmartFactRecord[]): string => {
  const header = CSV_COLUMNS.map(([name]) => name).join(",");
  const rows = records.map((record) => CSV_COLUMNS.map(([, read]) => escapeCsvField(read(record))).join(","));
  return [header, ...rows].join("\n");
};
