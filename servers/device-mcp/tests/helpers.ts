import { createLogger, RequestDispatcher, type JSONRPCResponse } from "@fleet/mcp-http";
import { FakeDriver } from "@fleet/coordination/testing";
import { createServerContext } from "../src/compose.js";
import { loadConfig } from "../src/config.js";

export { FakeDriver };

export function testContext(env: Record<string, string> = {}, serials = ["emu-1", "emu-2"]) {
  const driver = new FakeDriver(serials, [{ serial: "emu-off", status: "offline" }]);
  const ctx = createServerContext(loadConfig({ HOST: "127.0.0.1", PORT: "0", ...env }), {
    driver,
    logger: createLogger("device-mcp", { sink: () => {} }),
  });
  const dispatcher = new RequestDispatcher({ registry: ctx.registry, logger: ctx.log });
  let id = 0;
  const rpc = (method: string, params: Record<string, unknown> = {}) =>
    dispatcher.handle(JSON.stringify({ jsonrpc: "2.0", id: ++id, method, params }));
  return { ctx, driver, rpc };
}

/** The result member of a response; fails the test on an error envelope. */
export function resultOf(res: JSONRPCResponse): unknown {
  if ("error" in res) throw new Error(`unexpected error ${res.error.code}: ${res.error.message}`);
  return res.result;
}
