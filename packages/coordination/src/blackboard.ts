import { err, ok, type Result } from "@fleet/mcp-http";
import { notFound, type CoordinationError } from "./types.js";

export interface BlackboardEntry {
  key: string;
  value: unknown;
  updatedAt: number;
}

/** Shared key/value store; last write wins, nothing expires, no watchers. */
export class Blackboard {
  private readonly entries = new Map<string, BlackboardEntry>();

  constructor(private readonly now: () => number = () => Date.now()) {}

  share(key: string, value: unknown): BlackboardEntry {
    const entry = { key, value: structuredClone(value), updatedAt: this.now() };
    this.entries.set(key, entry);
    return { ...entry };
  }

  get(key: string): Result<unknown, CoordinationError> {
    const entry = this.entries.get(key);
    if (!entry) return err(notFound(`No shared data for key: ${key}`));
    return ok(structuredClone(entry.value));
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}
