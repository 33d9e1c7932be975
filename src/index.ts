/**
 * voice-latency-metrics
 *
 * Per-call latency tracking for voice agent pipelines
 * (speech → STT → LLM → TTS → audio delivered), exported as Prometheus
 * histograms, counters and gauges, with rolling percentile statistics and a
 * periodic host resource sampler.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

export { createCallMetrics } from "./create-call-metrics";
export type { CallMetrics } from "./create-call-metrics";

// ═══════════════════════════════════════════════════════════════════════════════
// COMPONENTS
// ═══════════════════════════════════════════════════════════════════════════════

export { CallTracker } from "./tracker/call-tracker";
export type { CallTrackerOptions, MarkResult } from "./tracker/call-tracker";
export { LatencyRecord, createStageTimestamps } from "./tracker/latency-record";
export { CALL_PHASES, callMachine, isCallPhase } from "./tracker/call-machine";
export type { CallPhase } from "./tracker/call-machine";
export { LATENCY_BUCKETS, MetricsSink, QUALITY_BUCKETS } from "./metrics/sink";
export type { MetricsSinkOptions } from "./metrics/sink";
export { startMetricsServer } from "./metrics/server";
export type { MetricsServer, MetricsServerOptions } from "./metrics/server";
export { CallHistory, computeLatencyStats } from "./stats/history";
export type { CallHistoryOptions } from "./stats/history";
export { SystemSampler, samplerMachine } from "./system/sampler";
export type { SystemSamplerOptions } from "./system/sampler";
export { createHostProbe } from "./system/probe";
export type { ResourceProbe } from "./system/probe";

// ═══════════════════════════════════════════════════════════════════════════════
// SESSION INTEGRATION
// ═══════════════════════════════════════════════════════════════════════════════

export { bindSession, createCallId, instrumentLlm } from "./session/bind-session";
export type { SessionHooks } from "./session/bind-session";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION, LOGGING & ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  DEFAULT_HISTORY_CAPACITY,
  DEFAULT_LATENCY_TARGET_MS,
  DEFAULT_METRICS_PORT,
  DEFAULT_STATS_WINDOW,
  DEFAULT_SYSTEM_SAMPLE_INTERVAL_MS,
  SIMULATED_CLOCK_OFFSET_MS,
  resolveConfig,
} from "./types/config";
export type { CallMetricsConfig, LogLevel, Now, ResolvedCallMetricsConfig } from "./types/config";
export { EnvSchema, loadConfigFromEnv } from "./config/env";
export type { Env } from "./config/env";
export { createLogger } from "./logging/logger";
export type { Logger, LoggerOptions } from "./logging/logger";
export { CallTrackingError, ConfigError, MetricsServerError } from "./errors";
export type { CallTrackingErrorKind, MetricsServerErrorKind } from "./errors";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  CallLatencies,
  EmptyLatencyStats,
  LatencyStats,
  PipelineStage,
  QualitySample,
  StageTimestampKey,
  StageTimestamps,
  SystemUsage,
} from "./types/metrics";
export { UNSET_TIMESTAMP } from "./types/metrics";

export type {
  CallEndedEvent,
  CallEvent,
  CallMetricsEvent,
  CallMetricsEventHandler,
  CallSetupFailedEvent,
  CallStartedEvent,
  MarkRejectedEvent,
  MarkType,
  SystemEvent,
  SystemSampleFailedEvent,
  SystemSampledEvent,
} from "./types/events";
