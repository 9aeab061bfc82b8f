import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { AuditEvent, AuditKind } from "./types.js";

const truncateString = (value: string, max: number): string =>
  value.length > max ? `${value.slice(0, max)}...<truncated>` : value;

const truncate = (value: unknown, max = 50000): unknown => {
  if (typeof value === "string") return truncateString(value, max);
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, inner]) => [key, typeof inner === "string" ? truncateString(inner, max) : inner])
    );
  }
  return value;
};

export const AUDIT_FILE_NAME = "audit.json";

export class AuditCollector {
  private events: AuditEvent[] = [];
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  record(kind: AuditKind, iteration: number, data: unknown): void {
    this.events.push({ kind, iteration, data: truncate(data), ts: this.now() });
  }

  async flush(runDir: string): Promise<string> {
    await mkdir(runDir, { recursive: true });
    const path = join(runDir, AUDIT_FILE_NAME);
    await writeFile(path, JSON.stringify(this.events, null, 2), "utf8");
    return path;
  }
}
