import type { AggregateCounts, SmartFactRecord, SmartFactStatus } from "./record.js";

const emptyStatusCounts = (): Record<SmartFactStatus, number> => ({
  candidate: 0,
  draft: 0,
  review: 0,
  published: 0,
  live: 0,
  retired: 0,
  archived: 0
});

export const aggregate = (records: SmartFactRecord[]): AggregateCounts => {
  const status = emptyStatusCounts();
  const types = new Map<string, number>();
  let dynamic = 0;
  let withCta = 0;

  for (const record of records) {
    status[record.status] += 1;
    types.set(record.type, (types.get(record.type) ?? 0) + 1);
    if (record.isDynamic) dynamic += 1;
    if (record.hasCta) withCta += 1;
  }

  // Sorted keys keep the serialized counts stable across runs.
  const type: Record<string, number> = {};
  for (const key of Array.from(types.keys()).sort()) {
    type[key] = types.get(key) ?? 0;
  }

  return {
    total: records.length,
    status,
    type,
    dynamic,
    withCta
  };
};
