/**
 * Call Tracker
 *
 * Owns the active calls and mediates every stage transition the session
 * reports. All operations are synchronous and never throw: problems come back
 * as a {@link MarkResult} and a log entry.
 *
 * Flow:
 * 1. `startCall` spawns a call actor with `speechStart = now`
 * 2. `mark*` sends a timestamped event to that actor
 * 3. `endCall` stops the actor, freezes its timestamps into a LatencyRecord,
 *    observes it into the sink and appends it to the history
 */

import { type ActorRefFrom, createActor } from "xstate";

import { CallTrackingError } from "../errors";
import type { Logger } from "../logging/logger";
import type { MetricsSink } from "../metrics/sink";
import type { CallHistory } from "../stats/history";
import type { Now } from "../types/config";
import type { CallMetricsEventHandler, MarkType } from "../types/events";
import type { QualitySample } from "../types/metrics";
import { type CallMarkEvent, type CallPhase, callMachine, isCallPhase } from "./call-machine";
import { LatencyRecord } from "./latency-record";

export type MarkResult = { ok: true } | { ok: false; error: CallTrackingError };

export interface CallTrackerOptions {
  sink: MetricsSink;
  history: CallHistory;
  logger: Logger;
  now: Now;
  latencyTargetMs: number;
  strict?: boolean;
  onEvent?: CallMetricsEventHandler;
}

type CallActor = ActorRefFrom<typeof callMachine>;

const LOG_META = { component: "call-tracker" } as const;

const OK: MarkResult = { ok: true };

export class CallTracker {
  private readonly calls = new Map<string, CallActor>();
  private readonly sink: MetricsSink;
  private readonly history: CallHistory;
  private readonly logger: Logger;
  private readonly now: Now;
  private readonly latencyTargetMs: number;
  private readonly strict: boolean;
  private readonly onEvent: CallMetricsEventHandler;

  constructor(options: CallTrackerOptions) {
    this.sink = options.sink;
    this.history = options.history;
    this.logger = options.logger;
    this.now = options.now;
    this.latencyTargetMs = options.latencyTargetMs;
    this.strict = options.strict ?? false;
    this.onEvent = options.onEvent ?? (() => {});
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Start tracking a call. Speech is considered detected now.
   *
   * A duplicate id replaces the running call and discards its partial data,
   * unless the tracker is strict, in which case the existing call is kept and
   * `duplicate-call` is returned.
   */
  startCall(callId: string): { record: LatencyRecord } & MarkResult {
    const existing = this.calls.get(callId);
    if (existing) {
      if (this.strict) {
        const error = new CallTrackingError(
          "duplicate-call",
          callId,
          `Call ${callId} is already active`,
        );
        this.reject(callId, "start", error);
        return { ok: false, error, record: this.snapshotRecord(existing) };
      }
      this.logger.warn("replacing active call with duplicate id", { ...LOG_META, callId });
      existing.stop();
    }

    const actor = createActor(callMachine, {
      input: { callId, startedAt: this.now(), strict: this.strict },
    });
    actor.start();
    this.calls.set(callId, actor);

    this.sink.totalCalls.inc();
    this.sink.activeCalls.set(this.calls.size);

    const record = this.snapshotRecord(actor);
    this.logger.info("call started", { ...LOG_META, callId });
    this.onEvent({ type: "call:started", callId, record });
    return { ok: true, record };
  }

  /**
   * Stop tracking a call and publish its latencies. Unknown ids are ignored.
   */
  endCall(callId: string, quality: QualitySample = {}): MarkResult {
    const actor = this.calls.get(callId);
    if (!actor) {
      return this.missing(callId, "end");
    }

    this.calls.delete(callId);
    this.sink.activeCalls.set(this.calls.size);

    const record = this.snapshotRecord(actor);
    actor.stop();

    const latencies = record.latencies();
    const targetMet = latencies.endToEndMs < this.latencyTargetMs;
    this.sink.observeLatencies(latencies, targetMet);
    this.sink.observeQuality(quality);
    this.history.append(record);

    this.logger.info("call ended", {
      ...LOG_META,
      callId,
      endToEndLatencyMs: Number(latencies.endToEndMs.toFixed(2)),
    });
    this.onEvent({ type: "call:ended", callId, record, latencies, targetMet, quality });
    return OK;
  }

  /** Count a call whose setup failed before it could be tracked. */
  recordFailedCallSetup(): void {
    this.sink.failedCallSetup.inc();
    this.onEvent({ type: "call:setup-failed" });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // STAGE MARKS
  // ═══════════════════════════════════════════════════════════════════════════

  markSttStart(callId: string): MarkResult {
    return this.mark(callId, "stt.start");
  }

  markSttEnd(callId: string): MarkResult {
    return this.mark(callId, "stt.end");
  }

  markLlmStart(callId: string): MarkResult {
    return this.mark(callId, "llm.start");
  }

  markLlmEnd(callId: string): MarkResult {
    return this.mark(callId, "llm.end");
  }

  markTtsStart(callId: string): MarkResult {
    return this.mark(callId, "tts.start");
  }

  markTtsEnd(callId: string): MarkResult {
    return this.mark(callId, "tts.end");
  }

  markAudioDelivered(callId: string): MarkResult {
    return this.mark(callId, "audio.delivered");
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // QUERIES
  // ═══════════════════════════════════════════════════════════════════════════

  getActiveCallCount(): number {
    return this.calls.size;
  }

  hasActiveCall(callId: string): boolean {
    return this.calls.has(callId);
  }

  /** Timestamps recorded so far for an active call. */
  getActiveRecord(callId: string): LatencyRecord | undefined {
    const actor = this.calls.get(callId);
    return actor ? this.snapshotRecord(actor) : undefined;
  }

  getPhase(callId: string): CallPhase | undefined {
    const value = this.calls.get(callId)?.getSnapshot().value;
    return isCallPhase(value) ? value : undefined;
  }

  /** Stop every call actor without publishing anything. */
  stopAll(): void {
    for (const actor of this.calls.values()) {
      actor.stop();
    }
    this.calls.clear();
    this.sink.activeCalls.set(0);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════════

  private mark(callId: string, type: MarkType): MarkResult {
    const actor = this.calls.get(callId);
    if (!actor) {
      return this.missing(callId, type);
    }

    const event: CallMarkEvent = { type, at: this.now() };
    if (!actor.getSnapshot().can(event)) {
      const error = new CallTrackingError(
        "stale-or-missing-mark",
        callId,
        `Mark ${type} is out of order for call ${callId} in phase ${this.getPhase(callId) ?? "unknown"}`,
      );
      this.reject(callId, type, error);
      return { ok: false, error };
    }

    actor.send(event);
    return OK;
  }

  private missing(callId: string, mark: MarkType | "end"): MarkResult {
    const error = new CallTrackingError(
      "stale-or-missing-mark",
      callId,
      `Call ${callId} is not active`,
    );
    if (mark === "end") {
      this.logger.debug("end for unknown call ignored", { ...LOG_META, callId });
    } else {
      this.reject(callId, mark, error);
    }
    return { ok: false, error };
  }

  private reject(callId: string, mark: MarkType | "start", error: CallTrackingError): void {
    const level = this.strict ? "warn" : "debug";
    this.logger.log(level, "mark rejected", { ...LOG_META, callId, mark, kind: error.kind });
    this.onEvent({ type: "mark:rejected", callId, mark, error });
  }

  private snapshotRecord(actor: CallActor): LatencyRecord {
    return new LatencyRecord(actor.getSnapshot().context.timestamps);
  }
}
