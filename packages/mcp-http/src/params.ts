// Readers for validated tool parameters. The validator has already applied
// defaults and coercions; these only narrow `unknown` for the compiler.

export function str(params: Record<string, unknown>, key: string, dflt = ""): string {
  const v = params[key];
  return typeof v === "string" ? v : dflt;
}

export function optStr(params: Record<string, unknown>, key: string): string | undefined {
  const v = params[key];
  return typeof v === "string" && v !== "" ? v : undefined;
}

export function num(params: Record<string, unknown>, key: string, dflt: number): number {
  const v = params[key];
  return typeof v === "number" && Number.isFinite(v) ? v : dflt;
}

export function strList(params: Record<string, unknown>, key: string): string[] {
  const v = params[key];
  if (!Array.isArray(v)) return [];
  return v.filter((x): x is string => typeof x === "string");
}
