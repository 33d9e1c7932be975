/**
 * Call Metrics Configuration Types
 *
 * Defines the configuration accepted by {@link createCallMetrics} and the
 * individual components, plus the defaults they resolve to.
 *
 * @module types/config
 */

import type { Logger } from "winston";
import type { SimulatedClock } from "xstate";

import type { ResourceProbe } from "../system/probe";
import type { CallMetricsEventHandler } from "./events";

export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";

/** Monotonic clock returning milliseconds. */
export type Now = () => number;

/**
 * Configuration for {@link createCallMetrics}.
 *
 * @example
 * ```typescript
 * const callMetrics = await createCallMetrics({
 *   metricsPort: 9464,
 *   strict: true,
 *   onEvent: (event) => {
 *     if (event.type === "call:ended") {
 *       console.log(event.callId, event.latencies.endToEndMs);
 *     }
 *   },
 * });
 * ```
 */
export interface CallMetricsConfig {
  /** TCP port for the Prometheus scrape endpoint. @default 8000 */
  metricsPort?: number;

  /** Interface the scrape endpoint binds to. @default "0.0.0.0" */
  metricsHost?: string;

  /** Start the HTTP scrape endpoint. @default true */
  serveMetrics?: boolean;

  /** Prefix for every metric name. @default "voice_agent" */
  metricPrefix?: string;

  /** Also register prom-client's default process metrics. @default false */
  collectDefaultMetrics?: boolean;

  /** End-to-end latency SLA in milliseconds; calls strictly under it count as met. @default 600 */
  latencyTargetMs?: number;

  /** Finished calls retained for statistics. @default 1000 */
  historyCapacity?: number;

  /** Most recent finished calls summarized by `getLatencyStats()`. @default 100 */
  statsWindow?: number;

  /** Start the periodic CPU/memory sampler. @default true */
  sampleSystem?: boolean;

  /** Delay between system samples in milliseconds. @default 5000 */
  systemSampleIntervalMs?: number;

  /**
   * Reject out-of-order marks and duplicate call ids instead of recording
   * them. Rejections are returned, never thrown.
   * @default false
   */
  strict?: boolean;

  /** Clock used for stage timestamps. @default performance.now */
  now?: Now;

  /**
   * Simulated clock for the sampler's delays (testing).
   * When set and `now` is not, stage timestamps read from it too, shifted by
   * {@link SIMULATED_CLOCK_OFFSET_MS} so that its time 0 is not the unset
   * sentinel.
   */
  simulatedClock?: SimulatedClock;

  /** Source of CPU and memory readings. @default host probe over node:os */
  probe?: ResourceProbe;

  /** Logger instance. @default a winston console logger at `logLevel` */
  logger?: Logger;

  /** Level for the default logger. @default "info" */
  logLevel?: LogLevel;

  /** Receives call and system notifications. */
  onEvent?: CallMetricsEventHandler;
}

export interface ResolvedCallMetricsConfig {
  metricsPort: number;
  metricsHost: string;
  serveMetrics: boolean;
  metricPrefix: string;
  collectDefaultMetrics: boolean;
  latencyTargetMs: number;
  historyCapacity: number;
  statsWindow: number;
  sampleSystem: boolean;
  systemSampleIntervalMs: number;
  strict: boolean;
  now: Now;
  simulatedClock: SimulatedClock | undefined;
  probe: ResourceProbe | undefined;
  logger: Logger | undefined;
  logLevel: LogLevel;
  onEvent: CallMetricsEventHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════════

export const DEFAULT_METRICS_PORT = 8000;
export const DEFAULT_LATENCY_TARGET_MS = 600;
export const DEFAULT_HISTORY_CAPACITY = 1000;
export const DEFAULT_STATS_WINDOW = 100;
export const DEFAULT_SYSTEM_SAMPLE_INTERVAL_MS = 5000;
export const SIMULATED_CLOCK_OFFSET_MS = 1000;

export function resolveConfig(config: CallMetricsConfig = {}): ResolvedCallMetricsConfig {
  const simulatedClock = config.simulatedClock;
  const now: Now =
    config.now ??
    (simulatedClock
      ? () => simulatedClock.now() + SIMULATED_CLOCK_OFFSET_MS
      : () => performance.now());

  return {
    metricsPort: config.metricsPort ?? DEFAULT_METRICS_PORT,
    metricsHost: config.metricsHost ?? "0.0.0.0",
    serveMetrics: config.serveMetrics ?? true,
    metricPrefix: config.metricPrefix ?? "voice_agent",
    collectDefaultMetrics: config.collectDefaultMetrics ?? false,
    latencyTargetMs: config.latencyTargetMs ?? DEFAULT_LATENCY_TARGET_MS,
    historyCapacity: config.historyCapacity ?? DEFAULT_HISTORY_CAPACITY,
    statsWindow: config.statsWindow ?? DEFAULT_STATS_WINDOW,
    sampleSystem: config.sampleSystem ?? true,
    systemSampleIntervalMs: config.systemSampleIntervalMs ?? DEFAULT_SYSTEM_SAMPLE_INTERVAL_MS,
    strict: config.strict ?? false,
    now,
    simulatedClock,
    probe: config.probe,
    logger: config.logger,
    logLevel: config.logLevel ?? "info",
    onEvent: config.onEvent ?? (() => {}),
  };
}
