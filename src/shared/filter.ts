import type { SmartFactRecord, SmartFactStatus } from "./record.js";

export const CONTENT_KINDS = ["static", "dynamic"] as const;

export type ContentKind = (typeof CONTENT_KINDS)[number];

export type RecordFilter = {
  q?: string;
  status?: SmartFactStatus;
  type?: string;
  kind?: ContentKind;
};

// Same matching rules as the dashboard page's search box and selects.
export const filterRecords = (records: SmartFactRecord[], filter: RecordFilter): SmartFactRecord[] => {
  const query = filter.q?.trim().toLowerCase() ?? "";
  return records.filter((record) => {
    const matchesSearch =
      !query ||
      record.id.toLowerCase().includes(query) ||
      record.content.toLowerCase().includes(query) ||
      record.type.includes(query);
    const matchesStatus = !filter.status || record.status === filter.status;
    const matchesType = !filter.type || record.type === filter.type;
    const matchesKind = !filter.kind || (filter.kind === "dynamic") === record.isDynamic;
    return matchesSearch && matchesStatus && matchesType && matchesKind;
  });
};
