/**
 * Dispatch Tracing
 *
 * Records how each `get`/`set`/`modify` call was routed: straight to the
 * optic's own primitive, or synthesized from the other one. Useful when
 * debugging a custom optic that only implements one primitive.
 */

import { tracingEnabled } from "./config.js";
import { describeOptic, type OpticShape } from "./style.js";
import type { OpticStyle } from "./types.js";

/** The entry point that was dispatched. */
export type DispatchOperation = "get" | "set" | "modify";

/** Whether the optic's own primitive ran, or one derived from the other. */
export type DispatchRoute = "direct" | "synthesized";

/**
 * A single dispatch event.
 */
export interface DispatchRecord {
  operation: DispatchOperation;
  /** Shape description of the optic */
  optic: string;
  style: OpticStyle;
  route: DispatchRoute;
  /** Timestamp for ordering */
  timestamp: number;
}

/**
 * Summary of recorded dispatches.
 */
export interface DispatchSummary {
  total: number;
  byOperation: Record<DispatchOperation, number>;
  byRoute: Record<DispatchRoute, number>;
  byOptic: Record<string, number>;
}

/**
 * Tracks dispatch decisions.
 */
export class DispatchTracer {
  private records: DispatchRecord[] = [];
  private enabled: boolean | undefined;

  constructor(enabled?: boolean) {
    this.enabled = enabled;
  }

  /**
   * Check if tracing is enabled. Falls back to the `tracing` config key
   * until enabled or disabled explicitly.
   */
  isEnabled(): boolean {
    if (this.enabled === undefined) {
      this.enabled = tracingEnabled();
    }
    return this.enabled;
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  /**
   * Record a dispatch event.
   */
  record(
    operation: DispatchOperation,
    optic: OpticShape,
    style: OpticStyle,
    route: DispatchRoute
  ): void {
    if (!this.isEnabled()) return;

    this.records.push({
      operation,
      optic: describeOptic(optic),
      style,
      route,
      timestamp: Date.now(),
    });
  }

  getAllRecords(): DispatchRecord[] {
    return [...this.records];
  }

  getSummary(): DispatchSummary {
    const byOperation: Record<DispatchOperation, number> = { get: 0, set: 0, modify: 0 };
    const byRoute: Record<DispatchRoute, number> = { direct: 0, synthesized: 0 };
    const byOptic: Record<string, number> = {};

    for (const record of this.records) {
      byOperation[record.operation]++;
      byRoute[record.route]++;
      byOptic[record.optic] = (byOptic[record.optic] ?? 0) + 1;
    }

    return { total: this.records.length, byOperation, byRoute, byOptic };
  }

  clear(): void {
    this.records = [];
  }

  /**
   * Format the recorded events, one per line.
   */
  format(): string {
    if (this.records.length === 0) {
      return "No dispatches recorded.";
    }
    return this.records
      .map((r) => `[${r.operation}] ${r.optic} (${r.style}) → ${r.route}`)
      .join("\n");
  }
}

/**
 * Process-wide tracer used by the dispatch layer.
 */
export const tracer = new DispatchTracer();
