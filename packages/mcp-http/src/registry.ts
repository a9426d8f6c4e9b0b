import { ok, RpcErrorCode, rpcError } from "./errors.js";
import { invokeTool } from "./invoke.js";
import type { Logger } from "./logger.js";
import { TOOL_NAMESPACE, type ToolContext, type ToolDef, type ToolResult, type ToolSummary } from "./types.js";
import { defineTool } from "./zodJson.js";

export const LIST_TOOL = "list";
export const CALL_TOOL = "call";
const META_TOOLS = new Set([LIST_TOOL, CALL_TOOL]);

export const namespaced = (name: string) => `${TOOL_NAMESPACE}${name}`;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Named tools, addressed on the wire as `tools/<name>`. The `list` and `call`
 * meta-tools are always present.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDef>();

  constructor(private readonly log: Logger) {
    this.registerMetaTools();
  }

  register(tool: ToolDef): void {
    const key = namespaced(tool.name);
    if (this.tools.has(key)) this.log.warn(`overwriting tool ${tool.name}`);
    else this.log.debug(`registered tool ${tool.name}`);
    this.tools.set(key, tool);
  }

  registerAll(tools: Iterable<ToolDef>): void {
    for (const t of tools) this.register(t);
  }

  /** Looks a tool up by its wire method, e.g. `tools/list`. */
  resolve(method: string): ToolDef | undefined {
    return this.tools.get(method);
  }

  get(name: string): ToolDef | undefined {
    return this.tools.get(namespaced(name));
  }

  list(): ToolSummary[] {
    const out: ToolSummary[] = [];
    for (const t of this.tools.values()) {
      if (META_TOOLS.has(t.name)) continue;
      out.push({
        name: t.name,
        description: t.description,
        inputSchema: t.inputSchema,
        annotations: t.annotations,
      });
    }
    return out;
  }

  async call(name: string, params: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const tool = this.get(name);
    if (!tool) return rpcError(RpcErrorCode.MethodNotFound, `Tool not found: ${name}`);
    const out = await invokeTool(tool, params, ctx, this.log);
    return out.ok ? ok({ result: out.value }) : out;
  }

  private registerMetaTools(): void {
    this.tools.set(
      namespaced(LIST_TOOL),
      defineTool({
        name: LIST_TOOL,
        doc: "List all available tools",
        handler: () => ok({ tools: this.list() }),
      })
    );
    this.tools.set(
      namespaced(CALL_TOOL),
      defineTool({
        name: CALL_TOOL,
        doc: `Call a tool by name
name: Tool name without the tools/ prefix
parameters: Parameters passed to the tool
arguments: Alias of parameters`,
        params: [
          { name: "name" },
          { name: "parameters", type: "object", optional: true },
          { name: "arguments", type: "object", optional: true },
        ],
        annotations: {},
        handler: (params, ctx) => {
          const name = typeof params.name === "string" ? params.name : "";
          const args = isRecord(params.parameters) ? params.parameters : isRecord(params.arguments) ? params.arguments : {};
          return this.call(name, args, ctx);
        },
      })
    );
  }
}
