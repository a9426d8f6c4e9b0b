import { z } from "zod";
import type { LogLevel } from "@fleet/mcp-http";

const EnvSchema = z.object({
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  RPC_PATH: z.string().startsWith("/").default("/jsonrpc"),
  ADB_PATH: z.string().default("adb"),
  DEVICE_ID: z.string().optional(),
  ADB_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface ServerConfig {
  host: string;
  port: number;
  path: string;
  adbPath: string;
  /** Id of the device this host acts for; used as default sender/target. */
  deviceId?: string;
  adbTimeoutMs: number;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  // Blank variables count as unset.
  const raw: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const v = env[key]?.trim();
    if (v) raw[key] = v;
  }

  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    host: e.HOST,
    port: e.PORT,
    path: e.RPC_PATH,
    adbPath: e.ADB_PATH,
    deviceId: e.DEVICE_ID,
    adbTimeoutMs: e.ADB_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL,
  };
}
