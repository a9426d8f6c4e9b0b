import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { JsonSchema, ToolAnnotations, ToolDef, ToolHandler } from "./types.js";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type ParamType = "string" | "integer" | "number" | "boolean" | "array" | "object" | "json";
export type ItemType = "string" | "integer" | "number" | "boolean";

/**
 * One declared parameter of a tool. A parameter is required unless it has a
 * default or is marked optional.
 */
export interface ParamSpec {
  name: string;
  /** Defaults to "string". */
  type?: ParamType;
  /** Element type of an array parameter, "string" when omitted. */
  items?: ItemType;
  enum?: readonly string[];
  default?: JsonValue;
  optional?: boolean;
  /** Overrides the description found in the tool's doc. */
  description?: string;
}

export interface ToolDescriptor {
  name: string;
  /**
   * First line becomes the tool description. Lines of the form
   * `<param>: <text>` describe parameters.
   */
  doc: string;
  params?: readonly ParamSpec[];
  annotations?: ToolAnnotations;
  handler: ToolHandler;
}

export function toJSONSchema(schema: z.ZodTypeAny): JsonSchema {
  return zodToJsonSchema(schema, { $refStrategy: "none" });
}

export function firstLine(doc: string): string {
  for (const line of doc.split("\n")) {
    const t = line.trim();
    if (t) return t;
  }
  return "";
}

export function paramDescription(doc: string, param: string): string | undefined {
  const prefix = `${param}:`;
  for (const line of doc.split("\n")) {
    const t = line.trim();
    if (!t.startsWith(prefix)) continue;
    const text = t.slice(prefix.length).trim();
    return text || undefined;
  }
  return undefined;
}

const READ_ONLY_WORDS = /\b(get|list|query|show|read)\b/i;
const DESTRUCTIVE_WORDS = /\b(delete|remove|clear|uninstall|wipe)\b/i;

export function inferAnnotations(description: string): ToolAnnotations {
  if (READ_ONLY_WORDS.test(description)) return { readOnlyHint: true };
  if (DESTRUCTIVE_WORDS.test(description)) return { destructiveHint: true };
  return {};
}

function itemSchema(t: ItemType): z.ZodTypeAny {
  switch (t) {
    case "integer":
      return z.coerce.number().int();
    case "number":
      return z.coerce.number();
    case "boolean":
      return z.boolean();
    default:
      return z.string();
  }
}

// Clients often send a list as a JSON string or a bare value.
function asList(v: unknown): unknown {
  if (typeof v !== "string") return v;
  try {
    const parsed: unknown = JSON.parse(v);
    return Array.isArray(parsed) ? parsed : [v];
  } catch {
    return [v];
  }
}

function baseSchema(spec: ParamSpec): z.ZodTypeAny {
  switch (spec.type ?? "string") {
    case "integer":
      return z.coerce.number().int();
    case "number":
      return z.coerce.number();
    case "boolean":
      return z.boolean();
    case "array":
      return z.preprocess(asList, z.array(itemSchema(spec.items ?? "string")));
    case "object":
      return z.record(z.unknown());
    case "json":
      return z.unknown();
    default: {
      const [first, ...rest] = spec.enum ?? [];
      return first === undefined ? z.string() : z.enum([first, ...rest]);
    }
  }
}

export function paramSchema(spec: ParamSpec, doc = ""): z.ZodTypeAny {
  let schema = baseSchema(spec);
  if (spec.default !== undefined) schema = schema.default(spec.default);
  else if (spec.optional) schema = schema.optional();
  const description = spec.description ?? paramDescription(doc, spec.name);
  return description ? schema.describe(description) : schema;
}

export function paramsToZod(params: readonly ParamSpec[], doc = ""): z.AnyZodObject {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const p of params) shape[p.name] = paramSchema(p, doc);
  return z.object(shape);
}

/** Builds a registrable tool from its descriptor. */
export function defineTool(descriptor: ToolDescriptor): ToolDef {
  const description = firstLine(descriptor.doc);
  const validator = paramsToZod(descriptor.params ?? [], descriptor.doc);
  return {
    name: descriptor.name,
    description,
    inputSchema: toJSONSchema(validator),
    annotations: descriptor.annotations ?? inferAnnotations(description),
    validator,
    handler: descriptor.handler,
  };
}
