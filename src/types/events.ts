/**
 * Call Metrics Event Types
 *
 * Notifications delivered through the `onEvent` callback.
 *
 * Naming: "<subject>:<what happened>".
 */

import type { CallTrackingError } from "../errors";
import type { LatencyRecord } from "../tracker/latency-record";
import type { CallLatencies, QualitySample, SystemUsage } from "./metrics";

// ═══════════════════════════════════════════════════════════════════════════════
// MARKS
// ═══════════════════════════════════════════════════════════════════════════════

/** Stage transitions a session can report for an active call. */
export type MarkType =
  | "stt.start"
  | "stt.end"
  | "llm.start"
  | "llm.end"
  | "tts.start"
  | "tts.end"
  | "audio.delivered";

// ═══════════════════════════════════════════════════════════════════════════════
// CALL EVENTS
// ═══════════════════════════════════════════════════════════════════════════════

export interface CallStartedEvent {
  type: "call:started";
  callId: string;
  record: LatencyRecord;
}

export interface CallEndedEvent {
  type: "call:ended";
  callId: string;
  record: LatencyRecord;
  latencies: CallLatencies;
  /** End-to-end latency was under the target */
  targetMet: boolean;
  quality: QualitySample;
}

export interface CallSetupFailedEvent {
  type: "call:setup-failed";
}

export interface MarkRejectedEvent {
  type: "mark:rejected";
  callId: string;
  mark: MarkType | "start";
  error: CallTrackingError;
}

export type CallEvent = CallStartedEvent | CallEndedEvent | CallSetupFailedEvent | MarkRejectedEvent;

// ═══════════════════════════════════════════════════════════════════════════════
// SYSTEM EVENTS
// ═══════════════════════════════════════════════════════════════════════════════

export interface SystemSampledEvent {
  type: "system:sampled";
  usage: SystemUsage;
}

export interface SystemSampleFailedEvent {
  type: "system:sample-failed";
  error: Error;
}

export type SystemEvent = SystemSampledEvent | SystemSampleFailedEvent;

// ═══════════════════════════════════════════════════════════════════════════════
// UNION
// ═══════════════════════════════════════════════════════════════════════════════

export type CallMetricsEvent = CallEvent | SystemEvent;

export type CallMetricsEventHandler = (event: CallMetricsEvent) => void;
