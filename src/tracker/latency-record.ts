/**
 * Latency Record
 *
 * Immutable view of one call's stage timestamps with derived latencies.
 * Derived values are plain differences: nothing checks that both endpoints
 * were marked, so an unmarked stage yields a meaningless (often negative)
 * number. Use {@link LatencyRecord.isStageComplete} before trusting one.
 */

import {
  type CallLatencies,
  type PipelineStage,
  type StageTimestamps,
  UNSET_TIMESTAMP,
} from "../types/metrics";

export function createStageTimestamps(speechStart: number): StageTimestamps {
  return {
    speechStart,
    sttStart: UNSET_TIMESTAMP,
    sttEnd: UNSET_TIMESTAMP,
    llmStart: UNSET_TIMESTAMP,
    llmEnd: UNSET_TIMESTAMP,
    ttsStart: UNSET_TIMESTAMP,
    ttsEnd: UNSET_TIMESTAMP,
    audioDelivered: UNSET_TIMESTAMP,
  };
}

const STAGE_ENDPOINTS = {
  stt: ["sttStart", "sttEnd"],
  llm: ["llmStart", "llmEnd"],
  tts: ["ttsStart", "ttsEnd"],
  endToEnd: ["speechStart", "audioDelivered"],
} as const satisfies Record<PipelineStage, readonly [keyof StageTimestamps, keyof StageTimestamps]>;

export class LatencyRecord implements StageTimestamps {
  readonly speechStart: number;
  readonly sttStart: number;
  readonly sttEnd: number;
  readonly llmStart: number;
  readonly llmEnd: number;
  readonly ttsStart: number;
  readonly ttsEnd: number;
  readonly audioDelivered: number;

  constructor(timestamps: StageTimestamps) {
    this.speechStart = timestamps.speechStart;
    this.sttStart = timestamps.sttStart;
    this.sttEnd = timestamps.sttEnd;
    this.llmStart = timestamps.llmStart;
    this.llmEnd = timestamps.llmEnd;
    this.ttsStart = timestamps.ttsStart;
    this.ttsEnd = timestamps.ttsEnd;
    this.audioDelivered = timestamps.audioDelivered;
    Object.freeze(this);
  }

  /** Record for a call whose speech was detected at `now`. */
  static begin(now: number): LatencyRecord {
    return new LatencyRecord(createStageTimestamps(now));
  }

  get sttLatencyMs(): number {
    return this.sttEnd - this.sttStart;
  }

  get llmLatencyMs(): number {
    return this.llmEnd - this.llmStart;
  }

  get ttsLatencyMs(): number {
    return this.ttsEnd - this.ttsStart;
  }

  get endToEndLatencyMs(): number {
    return this.audioDelivered - this.speechStart;
  }

  /** Whether both timestamps the stage's latency depends on were marked. */
  isStageComplete(stage: PipelineStage): boolean {
    const [start, end] = STAGE_ENDPOINTS[stage];
    return this[start] !== UNSET_TIMESTAMP && this[end] !== UNSET_TIMESTAMP;
  }

  latencies(): CallLatencies {
    return {
      sttMs: this.sttLatencyMs,
      llmMs: this.llmLatencyMs,
      ttsMs: this.ttsLatencyMs,
      endToEndMs: this.endToEndLatencyMs,
    };
  }

  toJSON(): StageTimestamps {
    return {
      speechStart: this.speechStart,
      sttStart: this.sttStart,
      sttEnd: this.sttEnd,
      llmStart: this.llmStart,
      llmEnd: this.llmEnd,
      ttsStart: this.ttsStart,
      ttsEnd: this.ttsEnd,
      audioDelivered: this.audioDelivered,
    };
  }
}
