import { describe, expect, it, vi } from "vitest";

import { createTrackerHarness } from "../../helpers/harness";
import { readCount, readSum, readValue } from "../../helpers/metrics";

describe("CallTracker", () => {
  describe("lifecycle", () => {
    it("starts a call with speech start at the current time", async () => {
      const { tracker, sink, now } = createTrackerHarness();

      const { record } = tracker.startCall("A");

      expect(record.speechStart).toBe(now());
      expect(record.audioDelivered).toBe(0);
      expect(tracker.getActiveCallCount()).toBe(1);
      expect(await readValue(sink.totalCalls)).toBe(1);
      expect(await readValue(sink.activeCalls)).toBe(1);
    });

    it("moves a call from active to history when it ends", async () => {
      const { tracker, history, sink, advance } = createTrackerHarness();

      tracker.startCall("A");
      advance(300);
      tracker.markAudioDelivered("A");
      const result = tracker.endCall("A");

      expect(result).toEqual({ ok: true });
      expect(tracker.hasActiveCall("A")).toBe(false);
      expect(tracker.getActiveCallCount()).toBe(0);
      expect(await readValue(sink.activeCalls)).toBe(0);
      expect(history.size).toBe(1);
      expect(history.records()[0].endToEndLatencyMs).toBe(300);
    });

    it("measures the stt stage from its marks", () => {
      const { tracker, advance } = createTrackerHarness();

      tracker.startCall("A");
      tracker.markSttStart("A");
      advance(50);
      tracker.markSttEnd("A");

      expect(tracker.getActiveRecord("A")?.sttLatencyMs).toBe(50);
    });

    it("uses the unset audio timestamp when a call ends without marks", async () => {
      const { tracker, history, sink, advance } = createTrackerHarness();

      tracker.startCall("B");
      advance(250);
      tracker.endCall("B");

      // audioDelivered stays at the 0 sentinel, so end-to-end is -speechStart
      const record = history.records()[0];
      expect(record.audioDelivered).toBe(0);
      expect(record.endToEndLatencyMs).toBe(-1_000);
      expect(record.isStageComplete("endToEnd")).toBe(false);
      // a negative latency is still under the target
      expect(await readValue(sink.latencyTargetMet)).toBe(1);
    });

    it("observes every latency into its histogram once", async () => {
      const { tracker, sink, advance } = createTrackerHarness();

      tracker.startCall("A");
      advance(10);
      tracker.markSttStart("A");
      advance(40);
      tracker.markSttEnd("A");
      tracker.markLlmStart("A");
      advance(200);
      tracker.markLlmEnd("A");
      tracker.markTtsStart("A");
      advance(100);
      tracker.markTtsEnd("A");
      advance(20);
      tracker.markAudioDelivered("A");
      tracker.endCall("A");

      expect(await readCount(sink.sttLatency)).toBe(1);
      expect(await readSum(sink.sttLatency)).toBe(40);
      expect(await readSum(sink.llmLatency)).toBe(200);
      expect(await readSum(sink.ttsLatency)).toBe(100);
      expect(await readSum(sink.endToEndLatency)).toBe(370);
      expect(await readCount(sink.responseTime95p)).toBe(1);
      expect(await readSum(sink.responseTimeAvg)).toBe(370);
    });

    it("logs the call id and end-to-end latency when a call ends", () => {
      const { tracker, logger, advance } = createTrackerHarness();
      const info = vi.spyOn(logger, "info");

      tracker.startCall("A");
      advance(412.125);
      tracker.markAudioDelivered("A");
      tracker.endCall("A");

      expect(info).toHaveBeenLastCalledWith("call ended", {
        component: "call-tracker",
        callId: "A",
        endToEndLatencyMs: 412.13,
      });
    });

    it("counts failed call setups independently of calls", async () => {
      const { tracker, sink, events } = createTrackerHarness();

      tracker.recordFailedCallSetup();
      tracker.recordFailedCallSetup();

      expect(await readValue(sink.failedCallSetup)).toBe(2);
      expect(await readValue(sink.totalCalls)).toBe(0);
      expect(events.byType("call:setup-failed")).toHaveLength(2);
    });

    it("emits started and ended events", () => {
      const { tracker, events, advance } = createTrackerHarness();

      tracker.startCall("A");
      advance(400);
      tracker.markAudioDelivered("A");
      tracker.endCall("A", { mosScore: 4 });

      expect(events.types()).toEqual(["call:started", "call:ended"]);
      const [ended] = events.byType("call:ended");
      expect(ended.callId).toBe("A");
      expect(ended.latencies.endToEndMs).toBe(400);
      expect(ended.targetMet).toBe(true);
      expect(ended.quality).toEqual({ mosScore: 4 });
    });
  });

  describe("latency target", () => {
    it("counts 100 calls at 500 ms as meeting the target", async () => {
      const { tracker, sink, history, advance } = createTrackerHarness();

      for (let i = 0; i < 100; i++) {
        const callId = `call-${i}`;
        tracker.startCall(callId);
        advance(500);
        tracker.markAudioDelivered(callId);
        tracker.endCall(callId);
      }

      expect(await readValue(sink.latencyTargetMet)).toBe(100);
      expect(await readValue(sink.latencyTargetMissed)).toBe(0);
      expect(history.getLatencyStats().targetMetPercentage).toBe(100);
    });

    it("counts a call at exactly the target as missed", async () => {
      const { tracker, sink, advance } = createTrackerHarness();

      tracker.startCall("A");
      advance(600);
      tracker.markAudioDelivered("A");
      tracker.endCall("A");

      expect(await readValue(sink.latencyTargetMet)).toBe(0);
      expect(await readValue(sink.latencyTargetMissed)).toBe(1);
    });
  });

  describe("quality", () => {
    it("observes each supplied reading once and keeps none in history", async () => {
      const { tracker, sink, history, advance } = createTrackerHarness();

      tracker.startCall("Q");
      advance(300);
      tracker.markAudioDelivered("Q");
      tracker.endCall("Q", { mosScore: 4.2, jitterMs: 15.0, packetLossRate: 0.1 });

      expect(await readCount(sink.mosScore)).toBe(1);
      expect(await readSum(sink.mosScore)).toBe(4.2);
      expect(await readCount(sink.jitter)).toBe(1);
      expect(await readSum(sink.jitter)).toBe(15);
      expect(await readCount(sink.packetLossRate)).toBe(1);
      expect(await readSum(sink.packetLossRate)).toBe(0.1);
      expect(Object.keys(history.records()[0].toJSON())).toEqual([
        "speechStart",
        "sttStart",
        "sttEnd",
        "llmStart",
        "llmEnd",
        "ttsStart",
        "ttsEnd",
        "audioDelivered",
      ]);
    });

    it("skips readings that were not supplied", async () => {
      const { tracker, sink } = createTrackerHarness();

      tracker.startCall("Q");
      tracker.endCall("Q", { jitterMs: 3 });

      expect(await readCount(sink.mosScore)).toBe(0);
      expect(await readCount(sink.jitter)).toBe(1);
      expect(await readCount(sink.packetLossRate)).toBe(0);
    });
  });

  describe("unknown calls", () => {
    it("ignores marks and ends for calls that were never started", async () => {
      const { tracker, sink, history } = createTrackerHarness();

      const marks = [
        tracker.markSttStart("ghost"),
        tracker.markSttEnd("ghost"),
        tracker.markLlmStart("ghost"),
        tracker.markLlmEnd("ghost"),
        tracker.markTtsStart("ghost"),
        tracker.markTtsEnd("ghost"),
        tracker.markAudioDelivered("ghost"),
        tracker.endCall("ghost", { mosScore: 3 }),
      ];

      for (const result of marks) {
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.kind).toBe("stale-or-missing-mark");
      }
      expect(tracker.getActiveCallCount()).toBe(0);
      expect(await readValue(sink.activeCalls)).toBe(0);
      expect(await readCount(sink.mosScore)).toBe(0);
      expect(history.size).toBe(0);
    });

    it("ignores marks that arrive after the call ended", () => {
      const { tracker, history, advance } = createTrackerHarness();

      tracker.startCall("A");
      advance(100);
      tracker.markAudioDelivered("A");
      tracker.endCall("A");
      advance(100);
      const late = tracker.markTtsEnd("A");

      expect(late.ok).toBe(false);
      expect(history.records()[0].ttsEnd).toBe(0);
    });

    it("keeps the active count equal to started-but-not-ended calls under interleaving", () => {
      const { tracker } = createTrackerHarness();

      tracker.startCall("X");
      tracker.markLlmStart("X");
      tracker.startCall("Y");
      tracker.endCall("X");
      tracker.markLlmStart("X");
      tracker.endCall("X");
      tracker.startCall("Z");
      tracker.markLlmEnd("Y");

      expect(tracker.getActiveCallCount()).toBe(2);
      expect(tracker.hasActiveCall("Y")).toBe(true);
      expect(tracker.hasActiveCall("Z")).toBe(true);
    });
  });

  describe("duplicate ids", () => {
    it("replaces the running call when lenient", async () => {
      const { tracker, sink, logger, advance } = createTrackerHarness();
      const warn = vi.spyOn(logger, "warn");

      tracker.startCall("D");
      tracker.markSttStart("D");
      advance(200);
      const second = tracker.startCall("D");

      expect(second.ok).toBe(true);
      expect(second.record.speechStart).toBe(1_200);
      expect(tracker.getActiveRecord("D")?.sttStart).toBe(0);
      expect(tracker.getActiveCallCount()).toBe(1);
      expect(await readValue(sink.totalCalls)).toBe(2);
      expect(await readValue(sink.activeCalls)).toBe(1);
      expect(warn).toHaveBeenCalledWith("replacing active call with duplicate id", {
        component: "call-tracker",
        callId: "D",
      });
    });

    it("rejects the duplicate and keeps the running call when strict", async () => {
      const { tracker, sink, events, advance } = createTrackerHarness({ strict: true });

      tracker.startCall("D");
      advance(200);
      const second = tracker.startCall("D");

      expect(second.ok).toBe(false);
      if (!second.ok) expect(second.error.kind).toBe("duplicate-call");
      expect(second.record.speechStart).toBe(1_000);
      expect(await readValue(sink.totalCalls)).toBe(1);
      expect(events.byType("mark:rejected")).toHaveLength(1);
    });
  });

  describe("strict mode", () => {
    it("rejects an out-of-order mark without recording it", () => {
      const { tracker, events, logger } = createTrackerHarness({ strict: true });
      const log = vi.spyOn(logger, "log");

      tracker.startCall("S");
      const result = tracker.markLlmEnd("S");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("stale-or-missing-mark");
        expect(result.error.callId).toBe("S");
      }
      expect(tracker.getActiveRecord("S")?.llmEnd).toBe(0);
      expect(tracker.getPhase("S")).toBe("speaking");
      expect(events.byType("mark:rejected")[0].mark).toBe("llm.end");
      expect(log).toHaveBeenCalledWith("warn", "mark rejected", {
        component: "call-tracker",
        callId: "S",
        mark: "llm.end",
        kind: "stale-or-missing-mark",
      });
    });

    it("accepts marks in pipeline order", () => {
      const { tracker, advance } = createTrackerHarness({ strict: true });

      tracker.startCall("S");
      const results = [
        tracker.markSttStart("S"),
        tracker.markSttEnd("S"),
        tracker.markLlmStart("S"),
        tracker.markLlmEnd("S"),
        tracker.markTtsStart("S"),
      ];
      advance(100);
      results.push(tracker.markTtsEnd("S"), tracker.markAudioDelivered("S"));

      expect(results.every((result) => result.ok)).toBe(true);
      expect(tracker.getPhase("S")).toBe("delivered");
      expect(tracker.getActiveRecord("S")?.endToEndLatencyMs).toBe(100);
    });

    it("records the same out-of-order mark when lenient", () => {
      const { tracker, now } = createTrackerHarness();

      tracker.startCall("S");
      const result = tracker.markLlmEnd("S");

      expect(result).toEqual({ ok: true });
      expect(tracker.getActiveRecord("S")?.llmEnd).toBe(now());
    });
  });

  it("drops active calls on stopAll", async () => {
    const { tracker, sink, history } = createTrackerHarness();

    tracker.startCall("A");
    tracker.startCall("B");
    tracker.stopAll();

    expect(tracker.getActiveCallCount()).toBe(0);
    expect(await readValue(sink.activeCalls)).toBe(0);
    expect(history.size).toBe(0);
  });
});
