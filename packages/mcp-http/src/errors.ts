/** Reserved JSON-RPC codes plus the server-defined application range. */
export const RpcErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  ToolFailure: -32000,
  NotFound: -32004,
  DeviceUnavailable: -32010,
} as const;

export type RpcErrorCodeValue = (typeof RpcErrorCode)[keyof typeof RpcErrorCode];

export interface RpcErrorBody {
  code: number;
  message: string;
}

export type Result<T, E = RpcErrorBody> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });
export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

export function rpcError(code: number, message: string): { ok: false; error: RpcErrorBody } {
  return err({ code, message });
}

/**
 * Typed application error. Handlers may throw it instead of returning a failed
 * result; code and message reach the caller unchanged.
 */
export class McpError extends Error {
  readonly code: number;

  constructor(message: string, code: number = RpcErrorCode.ToolFailure) {
    super(message);
    this.name = "McpError";
    this.code = code;
  }

  toBody(): RpcErrorBody {
    return { code: this.code, message: this.message };
  }
}
