import fs from "fs";
import path from "path";
import express from "express";
import * as v from "valibot";
import { config } from "../shared/config.js";
import { aggregate } from "../shared/aggregate.js";
import { toCsv } from "../shared/csv.js";
import { CONTENT_KINDS, filterRecords } from "../shared/filter.js";
import { SMART_FACT_STATUSES, type SmartFactRecord } from "../shared/record.js";
import { loadRecords, locateCodebase } from "../builder/pipeline.js";

export type AppOptions = {
  outputPath?: string;
  loadRecords?: () => SmartFactRecord[];
};

const querySchema = v.object({
  q: v.optional(v.string("q must be a single value")),
  status: v.optional(v.picklist(SMART_FACT_STATUSES, "Unknown status")),
  type: v.optional(v.string("type must be a single value")),
  kind: v.optional(v.picklist(CONTENT_KINDS, "kind must be static or dynamic")),
  limit: v.optional(v.string("limit must be a single value")),
  offset: v.optional(v.string("offset must be a single value"))
});

const parseLimit = (value: string | undefined, fallback: number) => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return Math.min(Math.floor(parsed), 200);
};

const parseOffset = (value: string | undefined) => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) return 0;
  return Math.floor(parsed);
};

const defaultLoadRecords = () => loadRecords(locateCodebase(config.codebasePath || undefined)).records;

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : "Extraction error");

export const createApp = (options: AppOptions = {}) => {
  const outputPath = path.resolve(options.outputPath ?? config.outputPath);
  const readRecords = options.loadRecords ?? defaultLoadRecords;

  const app = express();

  app.get("/health", (_req, res) => {
    res.status(200).send("OK");
  });

  app.get("/", (_req, res) => {
    if (!fs.existsSync(outputPath)) {
      return res.status(404).json({ error: "Dashboard has not been built yet" });
    }
    return res.sendFile(outputPath);
  });

  const filtered = (req: express.Request, res: express.Response) => {
    const query = v.safeParse(querySchema, req.query);
    if (!query.success) {
      res.status(400).json({ error: query.issues[0].message });
      return null;
    }
    const records = readRecords();
    return { query: query.output, records, matches: filterRecords(records, query.output) };
  };

  app.get("/records", (req, res) => {
    try {
      const result = filtered(req, res);
      if (!result) return;
      const limit = parseLimit(result.query.limit, 50);
      const offset = parseOffset(result.query.offset);
      const page = result.matches.slice(offset, offset + limit);
      res.json({
        count: page.length,
        total: result.matches.length,
        records: page
      });
    } catch (error) {
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  app.get("/records.csv", (req, res) => {
    try {
      const result = filtered(req, res);
      if (!result) return;
      res.type("text/csv").send(toCsv(result.matches));
    } catch (error) {
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  app.get("/records/:id", (req, res) => {
    try {
      const record = readRecords().find((entry) => entry.id === req.params.id);
      if (!record) {
        return res.status(404).json({ error: "Not found" });
      }
      return res.json(record);
    } catch (error) {
      return res.status(500).json({ error: errorMessage(error) });
    }
  });

  app.get("/counts", (_req, res) => {
    try {
      res.json(aggregate(readRecords()));
    } catch (error) {
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  return app;
};
