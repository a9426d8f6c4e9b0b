import type { CoordinationError, CoordinationErrorKind } from "@fleet/coordination";
import { err, ok, type Result, type RpcErrorBody, RpcErrorCode, type ToolResult } from "@fleet/mcp-http";

const CODES: Record<CoordinationErrorKind, number> = {
  not_found: RpcErrorCode.NotFound,
  device_unavailable: RpcErrorCode.DeviceUnavailable,
  invalid_argument: RpcErrorCode.InvalidParams,
};

export function toRpcError(e: CoordinationError): RpcErrorBody {
  return { code: CODES[e.kind], message: e.message };
}

/** Maps a coordinator result onto the wire: value through `map`, errors to codes. */
export function fromCoordination<T, U>(r: Result<T, CoordinationError>, map: (value: T) => U): ToolResult<U> {
  return r.ok ? ok(map(r.value)) : err(toRpcError(r.error));
}

export const invalidParams = (message: string) => err({ code: RpcErrorCode.InvalidParams, message });

/** Tool timeouts are given in seconds on the wire. */
export const seconds = (s: number) => Math.max(0, Math.round(s * 1000));
