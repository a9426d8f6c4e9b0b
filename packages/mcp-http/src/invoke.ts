import type { ZodError } from "zod";
import { McpError, RpcErrorCode, rpcError } from "./errors.js";
import { describeError, type Logger } from "./logger.js";
import type { ToolContext, ToolDef, ToolResult } from "./types.js";

function formatIssues(error: ZodError): string {
  return error.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/**
 * Validates parameters and runs a tool's handler to completion. A thrown
 * McpError keeps its code; anything else is logged and reported as a generic
 * internal error.
 */
export async function invokeTool(
  tool: ToolDef,
  params: Record<string, unknown>,
  ctx: ToolContext,
  log: Logger
): Promise<ToolResult> {
  let input = params;
  if (tool.validator) {
    const parsed = tool.validator.safeParse(params);
    if (!parsed.success) {
      return rpcError(RpcErrorCode.InvalidParams, `Invalid params for ${tool.name}: ${formatIssues(parsed.error)}`);
    }
    input = parsed.data;
  }

  try {
    return await tool.handler(input, ctx);
  } catch (e) {
    if (e instanceof McpError) {
      log.warn(`${tool.name} failed: ${e.message} (code ${e.code})`);
      return { ok: false, error: e.toBody() };
    }
    log.error(`${tool.name} threw while handling ${ctx.method}: ${describeError(e)}`);
    return rpcError(RpcErrorCode.InternalError, "Internal error");
  }
}
