/**
 * Dispatch Tracing
 *
 * Records how higher order calls were resolved, for debugging and for the
 * `trace` configuration flag. The global tracer starts enabled when
 * `config.flag("trace")` is true; tests create their own tracers.
 */

import { config } from "./config.js";

/**
 * Kinds of dispatch events.
 */
export type DispatchKind =
  | "leaf" // a callable handle invoked directly
  | "composite" // a registered composite call
  | "register"; // a composite definition registered

/**
 * A single dispatch event record.
 */
export interface DispatchRecord {
  kind: DispatchKind;
  /** Composite type name, or "handle" for leaf calls */
  target: string;
  /** Optional detail, e.g. the container path */
  detail?: string;
  /** Monotonic sequence number for ordering */
  seq: number;
}

/**
 * Writer used for printed output (default: console.error).
 */
export type LineWriter = (line: string) => void;

export const defaultWriter: LineWriter = (line) => console.error(line);

/**
 * Tracks dispatch events.
 */
export class DispatchTracer {
  private records: DispatchRecord[] = [];
  private enabled: boolean;
  private seq = 0;

  constructor(enabled: boolean = config.flag("trace")) {
    this.enabled = enabled;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  record(kind: DispatchKind, target: string, detail?: string): void {
    if (!this.enabled) return;
    this.records.push({ kind, target, detail, seq: this.seq++ });
  }

  getAllRecords(): DispatchRecord[] {
    return [...this.records];
  }

  /**
   * Count records per kind.
   */
  getSummary(): Record<DispatchKind, number> {
    const summary: Record<DispatchKind, number> = { leaf: 0, composite: 0, register: 0 };
    for (const record of this.records) {
      summary[record.kind]++;
    }
    return summary;
  }

  clear(): void {
    this.records = [];
    this.seq = 0;
  }
}

/**
 * Format records for CLI output, one line per record.
 */
export function formatTrace(records: readonly DispatchRecord[]): string[] {
  if (records.length === 0) {
    return ["no dispatches recorded"];
  }
  return records.map((record) => {
    const detail = record.detail ? ` (${record.detail})` : "";
    return `  ${record.seq}. [${record.kind}] ${record.target}${detail}`;
  });
}

/**
 * Print a tracer's records.
 */
export function printTrace(tracer: DispatchTracer, writer: LineWriter = defaultWriter): void {
  for (const line of formatTrace(tracer.getAllRecords())) {
    writer(line);
  }
}

let globalTracer: DispatchTracer | undefined;

/**
 * The process-wide tracer, created on first use.
 */
export function getGlobalTracer(): DispatchTracer {
  globalTracer ??= new DispatchTracer();
  return globalTracer;
}

/**
 * Drop the process-wide tracer so the next use re-reads `trace` (mainly for testing).
 */
export function resetGlobalTracer(): void {
  globalTracer = undefined;
}
