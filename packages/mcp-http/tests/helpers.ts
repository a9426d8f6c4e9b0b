import { createLogger, defineTool, McpError, ok, RpcErrorCode, type Logger, type ToolDef } from "../src/index.js";

export const quiet: Logger = createLogger("test", { sink: () => {} });

export function recordingLogger(level: "debug" | "info" = "debug") {
  const lines: string[] = [];
  return { lines, log: createLogger("test", { level, sink: (l) => lines.push(l) }) };
}

export const echo: ToolDef = defineTool({
  name: "echo",
  doc: `Return the given text
text: Text to return
times: How many copies`,
  params: [{ name: "text" }, { name: "times", type: "integer", default: 1 }],
  handler: (p) => ok({ echoed: String(p.text).repeat(typeof p.times === "number" ? p.times : 1) }),
});

export const boom: ToolDef = defineTool({
  name: "boom",
  doc: "Always throws",
  handler: () => {
    throw new Error("kaboom");
  },
});

export const missing: ToolDef = defineTool({
  name: "missing",
  doc: "Fails with a typed error",
  handler: () => {
    throw new McpError("widget 7 is gone", RpcErrorCode.NotFound);
  },
});
