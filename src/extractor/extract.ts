import fs from "fs";
import path from "path";
import * as v from "valibot";
import { DEFINITIONS_FILE, TEMPLATES_FILE } from "../shared/config.js";
import { SMART_FACT_STATUSES, type SmartFactRecord } from "../shared/record.js";
import { ParseError, findAssignment, findCalls, type PyValue } from "./pythonLiteral.js";

export const DEFINITION_CALLEE = "SmartFactDefinition";
export const TEMPLATES_NAME = "DISPLAY_TEMPLATES";

export class ExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExtractionError";
  }
}

export type ExtractionWarning = {
  kind: "definition" | "template";
  file: string;
  line: number | null;
  id: string | null;
  reason: string;
};

export type ExtractionResult = {
  records: SmartFactRecord[];
  warnings: ExtractionWarning[];
};

export type ExtractOptions = {
  definitionsFile?: string;
  templatesFile?: string;
};

export type SourceFiles = {
  definitionsPath: string;
  templatesPath: string;
  definitions: string;
  templates: string;
};

type Plain = string | number | boolean | null | Plain[] | { [key: string]: Plain };

const TYPE_SLUG = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;
// An absolute URL with a scheme, or an in-app path.
const CTA_LINK = /^(?:[a-z][a-z0-9+.-]*:\S+|\/\S*)$/i;

const recordSchema = v.object({
  id: v.pipe(v.string("id is missing"), v.trim(), v.nonEmpty("id is empty")),
  status: v.picklist(SMART_FACT_STATUSES, (issue) =>
    issue.input === undefined ? "status is missing" : `status ${JSON.stringify(issue.input)} is not a known status`
  ),
  type: v.pipe(
    v.string("type is not a string"),
    v.regex(TYPE_SLUG, (issue) => `type ${JSON.stringify(issue.input)} is not a category tag`)
  ),
  content: v.pipe(v.string("content is missing"), v.trim(), v.nonEmpty("content is empty")),
  priority: v.nullable(v.pipe(v.number("priority is not a number"), v.integer("priority is not an integer"))),
  cta: v.nullable(
    v.object({
      text: v.pipe(v.string("cta text is missing"), v.trim(), v.nonEmpty("cta text is empty")),
      url: v.pipe(v.string("cta url is missing"), v.trim(), v.regex(CTA_LINK, "cta url is not a URL or path"))
    }, "cta is not a call to action")
  ),
  requiredContext: v.array(v.string("required_context entries must be names or strings"), "required_context is not a list"),
  requiresPrimaryUser: v.boolean("requires_primary_user is not a boolean"),
  requiresProfileComplete: v.boolean("requires_profile_complete is not a boolean")
});

const lastSegment = (name: string) => name.slice(name.lastIndexOf(".") + 1);

const toPlain = (value: PyValue): Plain => {
  switch (value.kind) {
    case "string":
    case "number":
    case "bool":
    case "name":
      return value.value;
    case "none":
      return null;
    case "list":
      return value.items.map(toPlain);
    case "dict": {
      const out: { [key: string]: Plain } = {};
      for (const entry of value.entries) {
        out[String(toPlain(entry.key))] = toPlain(entry.value);
      }
      return out;
    }
    case "call": {
      const out: { [key: string]: Plain } = {};
      for (const [key, arg] of value.kwargs) {
        out[key] = toPlain(arg);
      }
      return out;
    }
  }
};

// `_("text")` and other single-argument wrappers around a string.
const unwrapText = (value: PyValue | undefined): string | undefined => {
  if (!value) return undefined;
  if (value.kind === "string") return value.value;
  if (value.kind === "call" && value.args.length === 1 && value.kwargs.size === 0) {
    return unwrapText(value.args[0]);
  }
  return undefined;
};

// SmartFactStatus.PUBLISHED -> "published", FactType.HOME_EQUITY -> "home-equity"
const vocabularyField = (value: PyValue | undefined): Plain | undefined => {
  if (!value) return undefined;
  if (value.kind === "name" || value.kind === "string") {
    const raw = value.kind === "name" ? lastSegment(value.value) : value.value;
    return raw.trim().toLowerCase().replace(/[\s_]+/g, "-");
  }
  return toPlain(value);
};

const contextField = (value: PyValue | undefined): Plain => {
  if (!value || value.kind === "none") return [];
  if (value.kind !== "list") return toPlain(value);
  return value.items.map((item) => (item.kind === "name" ? lastSegment(item.value) : toPlain(item)));
};

const toCta = (text: PyValue | undefined, url: PyValue | undefined): Plain => {
  const cta: { [key: string]: Plain } = {};
  const textValue = unwrapText(text);
  const urlValue = unwrapText(url);
  if (textValue !== undefined) cta.text = textValue;
  else if (text) cta.text = toPlain(text);
  if (urlValue !== undefined) cta.url = urlValue;
  else if (url) cta.url = toPlain(url);
  return cta;
};

const ctaField = (value: PyValue | undefined): Plain => {
  if (!value || value.kind === "none") return null;
  if (value.kind === "call") {
    return toCta(value.kwargs.get("text"), value.kwargs.get("url"));
  }
  if (value.kind === "dict") {
    const { entries } = value;
    const field = (name: string) => entries.find((entry) => unwrapText(entry.key) === name)?.value;
    return toCta(field("text"), field("url"));
  }
  return toPlain(value);
};

const optionalField = (value: PyValue | undefined, fallback: Plain): Plain =>
  value === undefined ? fallback : toPlain(value);

const describeIssues = (issues: ReadonlyArray<{ message: string }>) =>
  issues.map((issue) => issue.message).join("; ");

export const extractTemplateKeys = (content: string): string[] => {
  const keys: string[] = [];
  const stripped = content.replace(/\{\{|\}\}/g, "");
  const pattern = /\{([A-Za-z_]\w*)(?:[.[!:][^{}]*)?\}/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(stripped)) !== null) {
    if (!keys.includes(match[1])) {
      keys.push(match[1]);
    }
  }
  return keys;
};

const readTemplates = (source: string, file: string, warnings: ExtractionWarning[]) => {
  let assignment: ReturnType<typeof findAssignment>;
  try {
    assignment = findAssignment(source, TEMPLATES_NAME);
  } catch (error) {
    if (error instanceof ParseError) {
      throw new ExtractionError(`Cannot parse ${TEMPLATES_NAME} in ${file}: ${error.message}`);
    }
    throw error;
  }
  if (!assignment) {
    throw new ExtractionError(`${TEMPLATES_NAME} is not assigned in ${file}`);
  }
  if (assignment.value.kind !== "dict") {
    throw new ExtractionError(`${TEMPLATES_NAME} in ${file} is not a dict literal (line ${assignment.line})`);
  }

  const templates = new Map<string, string>();
  for (const entry of assignment.value.entries) {
    const key = unwrapText(entry.key);
    const text = unwrapText(entry.value);
    if (key === undefined || text === undefined) {
      warnings.push({
        kind: "template",
        file,
        line: assignment.line,
        id: key ?? null,
        reason: "display template entry is not a string keyed to a string"
      });
      continue;
    }
    templates.set(key.trim(), text);
  }
  return templates;
};

export const extractRecords = (
  definitionsSource: string,
  templatesSource: string,
  options: ExtractOptions = {}
): ExtractionResult => {
  const definitionsFile = options.definitionsFile ?? DEFINITIONS_FILE;
  const templatesFile = options.templatesFile ?? TEMPLATES_FILE;
  const warnings: ExtractionWarning[] = [];

  const templates = readTemplates(templatesSource, templatesFile, warnings);

  let calls: ReturnType<typeof findCalls>;
  try {
    calls = findCalls(definitionsSource, DEFINITION_CALLEE);
  } catch (error) {
    if (error instanceof ParseError) {
      throw new ExtractionError(`Cannot parse ${definitionsFile}: ${error.message}`);
    }
    throw error;
  }

  const records: SmartFactRecord[] = [];
  const seen = new Set<string>();

  for (const found of calls) {
    if (!found.ok) {
      warnings.push({ kind: "definition", file: definitionsFile, line: found.line, id: null, reason: found.error });
      continue;
    }

    const { kwargs } = found.call;
    const rawId = unwrapText(kwargs.get("id"));
    const id = rawId?.trim() || null;
    const content = (id !== null ? templates.get(id) : undefined) ?? unwrapText(kwargs.get("content"));

    const parsed = v.safeParse(recordSchema, {
      id: rawId,
      status: vocabularyField(kwargs.get("status")),
      type: vocabularyField(kwargs.get("type") ?? kwargs.get("category")) ?? "general",
      content,
      priority: optionalField(kwargs.get("priority"), null),
      cta: ctaField(kwargs.get("cta")),
      requiredContext: contextField(kwargs.get("required_context")),
      requiresPrimaryUser: optionalField(kwargs.get("requires_primary_user"), false),
      requiresProfileComplete: optionalField(kwargs.get("requires_profile_complete"), false)
    });

    if (!parsed.success) {
      warnings.push({ kind: "definition", file: definitionsFile, line: found.line, id, reason: describeIssues(parsed.issues) });
      continue;
    }

    const fields = parsed.output;
    if (seen.has(fields.id)) {
      warnings.push({ kind: "definition", file: definitionsFile, line: found.line, id: fields.id, reason: "duplicate id" });
      continue;
    }
    seen.add(fields.id);

    const templateKeys = extractTemplateKeys(fields.content);
    records.push({
      ...fields,
      templateKeys,
      isDynamic: templateKeys.length > 0,
      hasCta: fields.cta !== null
    });
  }

  return { records, warnings };
};

const readSource = (filePath: string) => {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ExtractionError(`Cannot read ${filePath}: ${message}`);
  }
};

export const readSources = (codebasePath: string): SourceFiles => {
  const definitionsPath = path.join(codebasePath, DEFINITIONS_FILE);
  const templatesPath = path.join(codebasePath, TEMPLATES_FILE);
  return {
    definitionsPath,
    templatesPath,
    definitions: readSource(definitionsPath),
    templates: readSource(templatesPath)
  };
};
