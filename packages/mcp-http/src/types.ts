import type { AnyZodObject } from "zod";
import type { zodToJsonSchema } from "zod-to-json-schema";
import type { Result, RpcErrorBody } from "./errors.js";

export const JSONRPC_VERSION = "2.0";
export const PROTOCOL_VERSION = "2024-11-05";
export const TOOL_NAMESPACE = "tools/";

export type JSONRPCId = string | number | null;

export interface JSONRPCRequest {
  jsonrpc: typeof JSONRPC_VERSION;
  id: JSONRPCId;
  method: string;
  params: Record<string, unknown>;
}

export type JSONRPCResponse =
  | { jsonrpc: typeof JSONRPC_VERSION; id: JSONRPCId; result: unknown }
  | { jsonrpc: typeof JSONRPC_VERSION; id: JSONRPCId; error: RpcErrorBody };

export type JsonSchema = ReturnType<typeof zodToJsonSchema>;

/** Advisory hints only; nothing enforces them. */
export interface ToolAnnotations {
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
}

export type ToolResult<T = unknown> = Result<T, RpcErrorBody>;

export interface ToolContext {
  requestId: JSONRPCId;
  method: string;
}

export type ToolHandler = (
  params: Record<string, unknown>,
  ctx: ToolContext
) => ToolResult | Promise<ToolResult>;

export interface ToolDef {
  name: string;
  description: string;
  inputSchema: JsonSchema;
  annotations: ToolAnnotations;
  /** Parameters are checked against this before the handler runs. */
  validator?: AnyZodObject;
  handler: ToolHandler;
}

export interface ToolSummary {
  name: string;
  description: string;
  inputSchema: JsonSchema;
  annotations: ToolAnnotations;
}

export interface ServerInfo {
  name: string;
  version: string;
}
