import { err, ok, type Result, RpcErrorCode, type RpcErrorBody } from "./errors.js";
import { invokeTool } from "./invoke.js";
import { describeError, type Logger } from "./logger.js";
import type { ToolRegistry } from "./registry.js";
import {
  JSONRPC_VERSION,
  PROTOCOL_VERSION,
  type JSONRPCId,
  type JSONRPCRequest,
  type JSONRPCResponse,
  type ServerInfo,
  type ToolDef,
  type ToolResult,
} from "./types.js";

export interface DispatcherOptions {
  registry: ToolRegistry;
  logger: Logger;
  serverInfo?: ServerInfo;
}

/** A rejected envelope, with whatever id could be read from it. */
export interface EnvelopeError {
  id: JSONRPCId;
  error: RpcErrorBody;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isId(v: unknown): v is JSONRPCId {
  return v === null || typeof v === "string" || typeof v === "number";
}

export function success(id: JSONRPCId, result: unknown): JSONRPCResponse {
  return { jsonrpc: JSONRPC_VERSION, id, result };
}

export function failure(id: JSONRPCId, error: RpcErrorBody): JSONRPCResponse {
  return { jsonrpc: JSONRPC_VERSION, id, error: { code: error.code, message: error.message } };
}

export class RequestDispatcher {
  private readonly registry: ToolRegistry;
  private readonly log: Logger;
  private readonly serverInfo: ServerInfo;

  constructor(opts: DispatcherOptions) {
    this.registry = opts.registry;
    this.log = opts.logger;
    this.serverInfo = opts.serverInfo ?? { name: "mcp-http-server", version: "1.0.0" };
  }

  parse(body: string | Buffer): Result<unknown> {
    const text = typeof body === "string" ? body : body.toString("utf8");
    if (!text.trim()) return err({ code: RpcErrorCode.ParseError, message: "Parse error: empty request body" });
    try {
      const payload: unknown = JSON.parse(text);
      return ok(payload);
    } catch {
      return err({ code: RpcErrorCode.ParseError, message: "Parse error: invalid JSON" });
    }
  }

  validate(payload: unknown): Result<JSONRPCRequest, EnvelopeError> {
    const invalid = (id: JSONRPCId, message: string) =>
      err({ id, error: { code: RpcErrorCode.InvalidRequest, message } });

    if (Array.isArray(payload)) return invalid(null, "Invalid Request: batch requests are not supported");
    if (!isRecord(payload)) return invalid(null, "Invalid Request: expected a JSON object");

    const rawId = payload.id;
    let id: JSONRPCId = null;
    if (rawId !== undefined) {
      if (!isId(rawId)) return invalid(null, "Invalid Request: id must be a string, number or null");
      id = rawId;
    }

    // `version` is accepted as a synonym of the standard `jsonrpc` member.
    const version = payload.jsonrpc ?? payload.version;
    if (version !== JSONRPC_VERSION) return invalid(id, `Invalid Request: version must be "${JSONRPC_VERSION}"`);

    const method = payload.method;
    if (typeof method !== "string" || !method) return invalid(id, "Invalid Request: missing method");

    const params = payload.params ?? {};
    if (!isRecord(params)) return invalid(id, "Invalid Request: params must be an object");

    return ok({ jsonrpc: JSONRPC_VERSION, id, method, params });
  }

  route(method: string): Result<ToolDef> {
    const tool = this.registry.resolve(method);
    if (!tool) return err({ code: RpcErrorCode.MethodNotFound, message: `Method not found: ${method}` });
    return ok(tool);
  }

  invoke(tool: ToolDef, request: JSONRPCRequest): Promise<ToolResult> {
    return invokeTool(tool, request.params, { requestId: request.id, method: request.method }, this.log);
  }

  /** Single entry point: always resolves to exactly one response envelope. */
  async handle(body: string | Buffer): Promise<JSONRPCResponse> {
    let id: JSONRPCId = null;
    try {
      const parsed = this.parse(body);
      if (!parsed.ok) return failure(null, parsed.error);

      const request = this.validate(parsed.value);
      if (!request.ok) return failure(request.error.id, request.error.error);
      id = request.value.id;

      return await this.dispatch(request.value);
    } catch (e) {
      this.log.error(`unhandled error while dispatching: ${describeError(e)}`);
      return failure(id, { code: RpcErrorCode.InternalError, message: "Internal error" });
    }
  }

  private async dispatch(request: JSONRPCRequest): Promise<JSONRPCResponse> {
    if (request.method === "initialize") {
      return success(request.id, {
        protocolVersion: PROTOCOL_VERSION,
        capabilities: { tools: { list: {}, call: {} } },
        serverInfo: this.serverInfo,
      });
    }

    const tool = this.route(request.method);
    if (!tool.ok) {
      this.log.debug(`unknown method ${request.method}`);
      return failure(request.id, tool.error);
    }

    const out = await this.invoke(tool.value, request);
    return out.ok ? success(request.id, out.value) : failure(request.id, out.error);
  }
}
