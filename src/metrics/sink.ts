/**
 * Metrics Sink
 *
 * Every Prometheus instrument the subsystem exposes, registered once on a
 * registry owned by the sink. Histogram buckets bracket the expected range of
 * each stage; prom-client appends the `+Inf` bucket itself.
 */

import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  Summary,
  collectDefaultMetrics,
} from "prom-client";

import type { CallLatencies, QualitySample, SystemUsage } from "../types/metrics";

// ═══════════════════════════════════════════════════════════════════════════════
// BUCKETS
// ═══════════════════════════════════════════════════════════════════════════════

export const LATENCY_BUCKETS = {
  endToEnd: [50, 100, 200, 300, 400, 500, 600, 800, 1000, 1500, 2000],
  stt: [10, 20, 50, 100, 200, 500, 1000],
  llm: [50, 100, 200, 500, 1000, 2000, 5000],
  tts: [50, 100, 200, 500, 1000, 2000],
} as const;

export const QUALITY_BUCKETS = {
  mos: [1, 2, 3, 4, 5],
  jitter: [0, 5, 10, 20, 50, 100, 200],
  packetLoss: [0, 0.1, 0.5, 1, 2, 5, 10],
} as const;

export interface MetricsSinkOptions {
  /** Prefix for every metric name. @default "voice_agent" */
  prefix?: string;
  /** Register prom-client's default process metrics. @default false */
  collectDefaultMetrics?: boolean;
  /** Registry to register on. @default a new Registry */
  registry?: Registry;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SINK
// ═══════════════════════════════════════════════════════════════════════════════

export class MetricsSink {
  readonly registry: Registry;
  readonly prefix: string;

  // Latency
  readonly endToEndLatency: Histogram;
  readonly sttLatency: Histogram;
  readonly llmLatency: Histogram;
  readonly ttsLatency: Histogram;

  // Coarser view of end-to-end latency
  readonly responseTime95p: Summary;
  readonly responseTimeAvg: Summary;

  // Calls
  readonly totalCalls: Counter;
  readonly failedCallSetup: Counter;
  readonly activeCalls: Gauge;
  readonly latencyTargetMet: Counter;
  readonly latencyTargetMissed: Counter;

  // Audio quality
  readonly mosScore: Histogram;
  readonly jitter: Histogram;
  readonly packetLossRate: Histogram;

  // System
  readonly cpuUsage: Gauge;
  readonly memoryUsage: Gauge;

  constructor(options: MetricsSinkOptions = {}) {
    this.registry = options.registry ?? new Registry();
    this.prefix = options.prefix ?? "voice_agent";
    const registers = [this.registry];
    const name = (suffix: string): string => `${this.prefix}_${suffix}`;

    this.endToEndLatency = new Histogram({
      name: name("end_to_end_latency_ms"),
      help: "End-to-end latency from speech to audio delivery",
      buckets: [...LATENCY_BUCKETS.endToEnd],
      registers,
    });
    this.sttLatency = new Histogram({
      name: name("stt_latency_ms"),
      help: "Speech-to-text processing latency",
      buckets: [...LATENCY_BUCKETS.stt],
      registers,
    });
    this.llmLatency = new Histogram({
      name: name("llm_latency_ms"),
      help: "LLM processing latency",
      buckets: [...LATENCY_BUCKETS.llm],
      registers,
    });
    this.ttsLatency = new Histogram({
      name: name("tts_latency_ms"),
      help: "Text-to-speech processing latency",
      buckets: [...LATENCY_BUCKETS.tts],
      registers,
    });

    this.responseTime95p = new Summary({
      name: name("response_time_95p_ms"),
      help: "95th percentile response time",
      percentiles: [0.95],
      registers,
    });
    this.responseTimeAvg = new Summary({
      name: name("response_time_avg_ms"),
      help: "Average response time",
      percentiles: [0.5],
      registers,
    });

    this.totalCalls = new Counter({
      name: name("total_calls"),
      help: "Total number of calls processed",
      registers,
    });
    this.failedCallSetup = new Counter({
      name: name("failed_call_setup"),
      help: "Number of failed call setups",
      registers,
    });
    this.activeCalls = new Gauge({
      name: name("active_calls"),
      help: "Number of currently active calls",
      registers,
    });
    this.latencyTargetMet = new Counter({
      name: name("latency_target_met"),
      help: "Number of calls meeting the end-to-end latency target",
      registers,
    });
    this.latencyTargetMissed = new Counter({
      name: name("latency_target_missed"),
      help: "Number of calls missing the end-to-end latency target",
      registers,
    });

    this.mosScore = new Histogram({
      name: name("mos_score"),
      help: "Mean Opinion Score for audio quality",
      buckets: [...QUALITY_BUCKETS.mos],
      registers,
    });
    this.jitter = new Histogram({
      name: name("jitter_ms"),
      help: "Audio jitter in milliseconds",
      buckets: [...QUALITY_BUCKETS.jitter],
      registers,
    });
    this.packetLossRate = new Histogram({
      name: name("packet_loss_rate"),
      help: "Packet loss rate as percentage",
      buckets: [...QUALITY_BUCKETS.packetLoss],
      registers,
    });

    this.cpuUsage = new Gauge({
      name: name("cpu_usage_percent"),
      help: "CPU usage percentage",
      registers,
    });
    this.memoryUsage = new Gauge({
      name: name("memory_usage_mb"),
      help: "Memory usage in MB",
      registers,
    });

    if (options.collectDefaultMetrics) {
      collectDefaultMetrics({ register: this.registry, prefix: `${this.prefix}_` });
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Recording
  // ─────────────────────────────────────────────────────────────────────────

  /** Observe a finished call's latencies and count it against the target. */
  observeLatencies(latencies: CallLatencies, targetMet: boolean): void {
    this.endToEndLatency.observe(latencies.endToEndMs);
    this.responseTime95p.observe(latencies.endToEndMs);
    this.responseTimeAvg.observe(latencies.endToEndMs);
    this.sttLatency.observe(latencies.sttMs);
    this.llmLatency.observe(latencies.llmMs);
    this.ttsLatency.observe(latencies.ttsMs);

    if (targetMet) {
      this.latencyTargetMet.inc();
    } else {
      this.latencyTargetMissed.inc();
    }
  }

  /** Observe whichever quality readings were supplied. */
  observeQuality(sample: QualitySample): void {
    if (sample.mosScore !== undefined) this.mosScore.observe(sample.mosScore);
    if (sample.jitterMs !== undefined) this.jitter.observe(sample.jitterMs);
    if (sample.packetLossRate !== undefined) this.packetLossRate.observe(sample.packetLossRate);
  }

  setSystemUsage(usage: SystemUsage): void {
    this.cpuUsage.set(usage.cpuPercent);
    this.memoryUsage.set(usage.memoryMb);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Exposition
  // ─────────────────────────────────────────────────────────────────────────

  /** Every instrument in Prometheus text exposition format. */
  metrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
