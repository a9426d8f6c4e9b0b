import "dotenv/config";
import { AdbDriver } from "@fleet/devices";
import { describeError, startMcpHttpServer } from "@fleet/mcp-http";
import { createServerContext } from "./compose.js";
import { loadConfig } from "./config.js";

async function main(): Promise<number> {
  const config = loadConfig();
  const ctx = createServerContext(config);
  const { log } = ctx;

  if (ctx.driver instanceof AdbDriver) {
    const v = await ctx.driver.version();
    if (v.exitCode !== 0) {
      log.error(`adb is not usable at ${config.adbPath}: ${v.stderr.trim()}`);
      return 1;
    }
    log.info(`adb: ${v.stdout.split("\n")[0]?.trim() ?? ""}`);
  }

  const running = await startMcpHttpServer({
    name: "device-mcp",
    version: "0.1.0",
    host: config.host,
    port: config.port,
    path: config.path,
    logger: log.child("http"),
    registry: ctx.registry,
  });
  ctx.lifecycle.registerResource(running.worker);
  ctx.lifecycle.installSignalHandlers();

  log.info(`JSON-RPC: ${running.url}`);
  log.info(`Tools: ${ctx.registry.list().map((t) => t.name).join(", ")}`);
  return 0;
}

main().then(
  (code) => {
    if (code !== 0) process.exit(code);
  },
  (e: unknown) => {
    console.error(`[device-mcp] ${describeError(e)}`);
    process.exit(1);
  }
);
