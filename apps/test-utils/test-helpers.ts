import { ILogger } from "@ladder-lottery/core-logging";

export interface LogEntry {
  level: "info" | "warn" | "error";
  msg: string;
  meta: Record<string, unknown>;
}

export class InMemoryLogger implements ILogger {
  readonly entries: LogEntry[] = [];

  info(msg: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: "info", msg, meta });
  }

  warn(msg: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: "warn", msg, meta });
  }

  error(msg: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: "error", msg, meta });
  }

  /** Most recent entry logged under `msg`. */
  find(msg: string): LogEntry | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (this.entries[i].msg === msg) {
        return this.entries[i];
      }
    }
    return undefined;
  }
}

/** Draw function replaying `values` in order, failing once they run out. */
export function sequenceRng(values: number[]): () => number {
  let index = 0;
  return () => {
    if (index >= values.length) {
      throw new Error("sequenceRng exhausted");
    }
    return values[index++];
  };
}
