/**
 * Call History
 *
 * Bounded FIFO of finished calls plus end-to-end latency statistics over the
 * most recent ones. Percentiles pick `sorted[floor(p * n)]` with no
 * interpolation.
 */

import type { LatencyRecord } from "../tracker/latency-record";
import { DEFAULT_HISTORY_CAPACITY, DEFAULT_LATENCY_TARGET_MS, DEFAULT_STATS_WINDOW } from "../types/config";
import type { EmptyLatencyStats, LatencyStats } from "../types/metrics";

export interface CallHistoryOptions {
  /** @default 1000 */
  capacity?: number;
  /** @default 100 */
  statsWindow?: number;
  /** @default 600 */
  latencyTargetMs?: number;
}

export function computeLatencyStats(
  latencies: readonly number[],
  latencyTargetMs: number = DEFAULT_LATENCY_TARGET_MS,
): LatencyStats | EmptyLatencyStats {
  const n = latencies.length;
  if (n === 0) {
    return {};
  }

  const sorted = [...latencies].sort((a, b) => a - b);
  const pick = (fraction: number): number => sorted[Math.min(n - 1, Math.floor(fraction * n))];
  const total = sorted.reduce((sum, value) => sum + value, 0);
  const underTarget = sorted.filter((value) => value < latencyTargetMs).length;

  return {
    avgLatencyMs: total / n,
    p95LatencyMs: pick(0.95),
    p99LatencyMs: pick(0.99),
    minLatencyMs: sorted[0],
    maxLatencyMs: sorted[n - 1],
    targetMetPercentage: (underTarget / n) * 100,
  };
}

export class CallHistory {
  private entries: LatencyRecord[] = [];
  readonly capacity: number;
  readonly statsWindow: number;
  readonly latencyTargetMs: number;

  constructor(options: CallHistoryOptions = {}) {
    this.capacity = options.capacity ?? DEFAULT_HISTORY_CAPACITY;
    this.statsWindow = options.statsWindow ?? DEFAULT_STATS_WINDOW;
    this.latencyTargetMs = options.latencyTargetMs ?? DEFAULT_LATENCY_TARGET_MS;
  }

  get size(): number {
    return this.entries.length;
  }

  append(record: LatencyRecord): void {
    this.entries.push(record);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  /** Oldest first. */
  records(): readonly LatencyRecord[] {
    return this.entries;
  }

  recent(count: number): readonly LatencyRecord[] {
    return count <= 0 ? [] : this.entries.slice(-count);
  }

  getLatencyStats(): LatencyStats | EmptyLatencyStats {
    return computeLatencyStats(
      this.recent(this.statsWindow).map((record) => record.endToEndLatencyMs),
      this.latencyTargetMs,
    );
  }

  clear(): void {
    this.entries = [];
  }
}
