/**
 * Create Call Metrics
 *
 * Public function that wires the tracker, sink, history, scrape endpoint and
 * system sampler into one explicitly owned component.
 */

import { createLogger, type Logger } from "./logging/logger";
import { type MetricsServer, startMetricsServer } from "./metrics/server";
import { MetricsSink } from "./metrics/sink";
import { CallHistory } from "./stats/history";
import { createHostProbe } from "./system/probe";
import { SystemSampler } from "./system/sampler";
import { CallTracker, type MarkResult } from "./tracker/call-tracker";
import type { LatencyRecord } from "./tracker/latency-record";
import { type CallMetricsConfig, resolveConfig } from "./types/config";
import type { EmptyLatencyStats, LatencyStats, QualitySample } from "./types/metrics";

/**
 * Call metrics instance.
 * Session event handlers receive this (or its `tracker`) by reference.
 */
export interface CallMetrics {
  readonly tracker: CallTracker;
  readonly sink: MetricsSink;
  readonly history: CallHistory;
  readonly logger: Logger;
  /** Bound scrape port, or null when `serveMetrics` is false */
  readonly metricsPort: number | null;

  startCall(callId: string): LatencyRecord;
  markSttStart(callId: string): MarkResult;
  markSttEnd(callId: string): MarkResult;
  markLlmStart(callId: string): MarkResult;
  markLlmEnd(callId: string): MarkResult;
  markTtsStart(callId: string): MarkResult;
  markTtsEnd(callId: string): MarkResult;
  markAudioDelivered(callId: string): MarkResult;
  endCall(callId: string, quality?: QualitySample): MarkResult;
  recordFailedCallSetup(): void;

  /** End-to-end statistics over the most recent finished calls. */
  getLatencyStats(): LatencyStats | EmptyLatencyStats;

  /**
   * Stop the sampler, drop active calls and close the scrape endpoint.
   * Safe to call more than once.
   */
  shutdown(): Promise<void>;
}

/**
 * Create a call metrics instance.
 *
 * @throws {MetricsServerError} when the scrape port cannot be bound
 *
 * @example
 * ```typescript
 * const callMetrics = await createCallMetrics({ metricsPort: 8000 });
 *
 * callMetrics.startCall(room.name);
 * callMetrics.markSttStart(room.name);
 * // ...
 * callMetrics.endCall(room.name, { mosScore: 4.3 });
 *
 * process.on("SIGTERM", () => void callMetrics.shutdown());
 * ```
 */
export async function createCallMetrics(config: CallMetricsConfig = {}): Promise<CallMetrics> {
  const resolved = resolveConfig(config);
  const logger = resolved.logger ?? createLogger({ level: resolved.logLevel });

  const sink = new MetricsSink({
    prefix: resolved.metricPrefix,
    collectDefaultMetrics: resolved.collectDefaultMetrics,
  });
  const history = new CallHistory({
    capacity: resolved.historyCapacity,
    statsWindow: resolved.statsWindow,
    latencyTargetMs: resolved.latencyTargetMs,
  });
  const tracker = new CallTracker({
    sink,
    history,
    logger,
    now: resolved.now,
    latencyTargetMs: resolved.latencyTargetMs,
    strict: resolved.strict,
    onEvent: resolved.onEvent,
  });

  // Bind before starting anything else so a taken port leaves nothing running.
  const server: MetricsServer | null = resolved.serveMetrics
    ? await startMetricsServer(sink, {
        port: resolved.metricsPort,
        host: resolved.metricsHost,
        logger,
      })
    : null;

  const sampler = resolved.sampleSystem
    ? new SystemSampler({
        sink,
        probe: resolved.probe ?? createHostProbe(),
        logger,
        intervalMs: resolved.systemSampleIntervalMs,
        clock: resolved.simulatedClock,
        onEvent: resolved.onEvent,
      })
    : null;
  sampler?.start();

  let shutdownPromise: Promise<void> | null = null;

  return {
    tracker,
    sink,
    history,
    logger,
    metricsPort: server?.port ?? null,

    startCall: (callId) => tracker.startCall(callId).record,
    markSttStart: (callId) => tracker.markSttStart(callId),
    markSttEnd: (callId) => tracker.markSttEnd(callId),
    markLlmStart: (callId) => tracker.markLlmStart(callId),
    markLlmEnd: (callId) => tracker.markLlmEnd(callId),
    markTtsStart: (callId) => tracker.markTtsStart(callId),
    markTtsEnd: (callId) => tracker.markTtsEnd(callId),
    markAudioDelivered: (callId) => tracker.markAudioDelivered(callId),
    endCall: (callId, quality) => tracker.endCall(callId, quality),
    recordFailedCallSetup: () => tracker.recordFailedCallSetup(),

    getLatencyStats: () => history.getLatencyStats(),

    shutdown: () => {
      shutdownPromise ??= (async () => {
        sampler?.stop();
        tracker.stopAll();
        await server?.close();
        logger.info("call metrics shut down", { component: "call-metrics" });
      })();
      return shutdownPromise;
    },
  };
}
