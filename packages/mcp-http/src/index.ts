// packages/mcp-http/src/index.ts
import type { Server } from "node:http";
import express, { type ErrorRequestHandler, type Express, type Response } from "express";
import { failure, RequestDispatcher } from "./dispatcher.js";
import { RpcErrorCode } from "./errors.js";
import { createLogger, describeError, type Logger } from "./logger.js";
import type { BackgroundWorker } from "./lifecycle.js";
import { ToolRegistry } from "./registry.js";
import type { JSONRPCResponse, ToolDef } from "./types.js";

export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./zodJson.js";
export * from "./params.js";
export { invokeTool } from "./invoke.js";
export { ToolRegistry, namespaced, LIST_TOOL, CALL_TOOL } from "./registry.js";
export { RequestDispatcher, success, failure, type DispatcherOptions, type EnvelopeError } from "./dispatcher.js";
export {
  ResourceLifecycleManager,
  isWorker,
  type BackgroundWorker,
  type Controller,
  type TrackedResource,
  type SignalOptions,
  type LifecycleOptions,
} from "./lifecycle.js";

export interface StartOptions {
  name?: string;
  version?: string;
  host?: string;
  port?: number;
  path?: string; // e.g. "/jsonrpc"
  bodyLimit?: string;
  logger?: Logger;
  /** Use an existing registry; otherwise one is built from `tools`. */
  registry?: ToolRegistry;
  tools?: ToolDef[];
}

export interface RunningServer {
  app: Express;
  server: Server;
  url: string;
  port: number;
  /** Lifecycle handle: stops accepting connections, in-flight calls finish. */
  worker: BackgroundWorker;
  close(): Promise<void>;
}

function cors(res: Response) {
  res.setHeader("access-control-allow-origin", "*");
  res.setHeader("access-control-allow-headers", "content-type");
  res.setHeader("access-control-allow-methods", "POST, OPTIONS");
}

// Body parser failures carry a `type` such as "entity.too.large".
function isBodyError(e: unknown): boolean {
  return typeof e === "object" && e !== null && "type" in e && typeof e.type === "string";
}

export function createMcpHttpApp(opts: StartOptions = {}): Express {
  const path = opts.path ?? "/jsonrpc";
  const log = opts.logger ?? createLogger("mcp-http");
  const registry = opts.registry ?? new ToolRegistry(log);
  if (opts.tools) registry.registerAll(opts.tools);
  const dispatcher = new RequestDispatcher({
    registry,
    logger: log,
    serverInfo: { name: opts.name ?? "mcp-http-server", version: opts.version ?? "1.0.0" },
  });

  const reply = (res: Response, response: JSONRPCResponse) => {
    let text: string;
    try {
      text = JSON.stringify(response);
    } catch (e) {
      log.error(`response for id ${String(response.id)} is not serializable: ${describeError(e)}`);
      text = JSON.stringify(failure(response.id, { code: RpcErrorCode.InternalError, message: "Internal error" }));
    }
    res.status(200).type("application/json").send(text);
  };

  const app = express();

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true });
  });

  app.options(path, (_req, res) => {
    cors(res);
    res.status(204).end();
  });

  // The body is read as text so that malformed JSON is answered with a
  // JSON-RPC parse error instead of express' own 400 page.
  app.post(path, express.text({ type: () => true, limit: opts.bodyLimit ?? "1mb" }), (req, res, next) => {
    cors(res);
    const body: unknown = req.body;
    dispatcher
      .handle(typeof body === "string" ? body : "")
      .then((response) => reply(res, response))
      .catch(next);
  });

  app.get(path, (_req, res) => {
    res.status(200).type("text/plain").send("Endpoint expects POST JSON-RPC.\n");
  });

  const onError: ErrorRequestHandler = (e: unknown, _req, res, next) => {
    if (res.headersSent) return next(e);
    cors(res);
    if (isBodyError(e)) {
      log.warn(`POST ${path} rejected: ${describeError(e)}`);
      res.status(200).json(failure(null, { code: RpcErrorCode.ParseError, message: "Parse error: unreadable request body" }));
      return;
    }
    log.error(`POST ${path} failed: ${describeError(e)}`);
    res.status(200).json(failure(null, { code: RpcErrorCode.InternalError, message: "Internal error" }));
  };
  app.use(onError);

  return app;
}

export async function startMcpHttpServer(opts: StartOptions = {}): Promise<RunningServer> {
  const log = opts.logger ?? createLogger("mcp-http");
  const host = opts.host ?? "0.0.0.0";
  const path = opts.path ?? "/jsonrpc";
  const app = createMcpHttpApp({ ...opts, logger: log });

  const server = await new Promise<Server>((resolve, reject) => {
    const s = app.listen(opts.port ?? 8000, host, () => resolve(s));
    s.once("error", reject);
  });

  const address = server.address();
  const port = address !== null && typeof address === "object" ? address.port : opts.port ?? 8000;
  const url = `http://${host}:${port}${path}`;
  log.info(`listening on :${port} (path ${path})`);

  const close = () =>
    new Promise<void>((resolve, reject) => {
      if (!server.listening) return resolve();
      server.close((e) => (e ? reject(e) : resolve()));
      server.closeIdleConnections();
    });

  const worker: BackgroundWorker = {
    name: "http-server",
    isRunning: () => server.listening,
    stop: () => {
      server.close();
      server.closeIdleConnections();
    },
  };

  return { app, server, url, port, worker, close };
}
