import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { startMcpHttpServer, type RunningServer } from "@fleet/mcp-http";
import { testContext } from "./helpers.js";

let running: RunningServer;
const { ctx } = testContext();

beforeAll(async () => {
  running = await startMcpHttpServer({
    name: "device-mcp",
    host: ctx.config.host,
    port: ctx.config.port,
    path: ctx.config.path,
    logger: ctx.log,
    registry: ctx.registry,
  });
  ctx.lifecycle.registerResource(running.worker);
});

afterAll(async () => {
  await ctx.lifecycle.cleanup();
});

async function rpc(id: number, method: string, params: Record<string, unknown> = {}) {
  const res = await fetch(running.url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify({ jsonrpc: "2.0", id, method, params }),
  });
  expect(res.status).toBe(200);
  const body: unknown = await res.json();
  return body;
}

describe("device-mcp over HTTP", () => {
  it("initializes and lists its tools", async () => {
    expect(await rpc(1, "initialize")).toMatchObject({ result: { serverInfo: { name: "device-mcp" } } });
    const listed = await rpc(2, "tools/list");
    expect(listed).toMatchObject({ id: 2, result: { tools: expect.any(Array) } });
    expect(JSON.stringify(listed)).toContain('"name":"share_between_devices"');
  });

  it("shares data between requests", async () => {
    await rpc(3, "tools/share_between_devices", { action: "share_data", data_key: "step", data_value: 2 });
    expect(await rpc(4, "tools/share_between_devices", { action: "get_data", data_key: "step" })).toEqual({
      jsonrpc: "2.0",
      id: 4,
      result: { success: true, data: 2 },
    });
  });

  it("stops listening on cleanup", async () => {
    const { ctx: other } = testContext();
    const server = await startMcpHttpServer({ host: "127.0.0.1", port: 0, logger: other.log, registry: other.registry });
    other.lifecycle.registerResource(server.worker);
    await other.lifecycle.cleanup();
    expect(server.server.listening).toBe(false);
  });
});
