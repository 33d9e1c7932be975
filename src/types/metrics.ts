/**
 * Call Metrics Types
 *
 * Types shared by the tracker, the metrics sink and the history aggregator.
 *
 * Architecture:
 * - StageTimestamps: raw clock readings collected while a call is active
 * - CallLatencies: stage and end-to-end latencies derived when a call ends
 * - QualitySample: audio-quality readings supplied at call end (never stored)
 * - LatencyStats: rolling statistics over recent finished calls
 */

// ═══════════════════════════════════════════════════════════════════════════════
// PER-CALL TIMING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Clock readings for one call, in milliseconds from a monotonic clock.
 * A value of {@link UNSET_TIMESTAMP} means the stage was never marked.
 */
export interface StageTimestamps {
  speechStart: number;
  sttStart: number;
  sttEnd: number;
  llmStart: number;
  llmEnd: number;
  ttsStart: number;
  ttsEnd: number;
  audioDelivered: number;
}

export type StageTimestampKey = keyof StageTimestamps;

/** Sentinel for a timestamp that has not been recorded. */
export const UNSET_TIMESTAMP = 0;

/** Pipeline phases with their own start/end pair, plus the whole call. */
export type PipelineStage = "stt" | "llm" | "tts" | "endToEnd";

/**
 * Latencies derived from a call's timestamps (ms).
 */
export interface CallLatencies {
  /** Speech-to-text processing time */
  sttMs: number;
  /** Time from LLM request to final token */
  llmMs: number;
  /** Text-to-speech synthesis time */
  ttsMs: number;
  /** Time from detected speech to audio delivered to the caller */
  endToEndMs: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// AUDIO QUALITY
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Audio quality readings supplied when a call ends.
 * Each field is optional; only supplied values are observed.
 */
export interface QualitySample {
  /** Mean Opinion Score, typically 1.0 - 5.0 */
  mosScore?: number;
  /** Jitter in milliseconds */
  jitterMs?: number;
  /** Packet loss as a percentage */
  packetLossRate?: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SYSTEM RESOURCES
// ═══════════════════════════════════════════════════════════════════════════════

export interface SystemUsage {
  cpuPercent: number;
  memoryMb: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// AGGREGATE STATISTICS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * End-to-end latency statistics over the most recent finished calls.
 */
export interface LatencyStats {
  avgLatencyMs: number;
  /** sorted[floor(0.95 * n)], no interpolation */
  p95LatencyMs: number;
  /** sorted[floor(0.99 * n)], no interpolation */
  p99LatencyMs: number;
  minLatencyMs: number;
  maxLatencyMs: number;
  /** Share of calls under the latency target, 0 - 100 */
  targetMetPercentage: number;
}

/** Returned when there is no finished call to summarize. */
export type EmptyLatencyStats = { [K in keyof LatencyStats]?: never };
