/**
 * Call State Machine
 *
 * One actor per active call. Each stage mark arrives as an event carrying the
 * clock reading, and the machine stores it in context.
 *
 * Architecture:
 * - States follow the pipeline: speaking → transcribing → transcribed →
 *   thinking → responded → synthesizing → (synthesized | streaming) → delivered
 * - An in-order mark is handled by the current state and advances it
 * - Any other mark bubbles to the root handler, which records it without
 *   moving; that handler is guarded off in strict mode, so
 *   `snapshot.can(event)` is false for out-of-order marks
 * - `delivered` accepts a new `stt.start` for the next turn of the same call
 */

import { assign, setup } from "xstate";

import type { MarkType } from "../types/events";
import type { StageTimestampKey, StageTimestamps } from "../types/metrics";
import { createStageTimestamps } from "./latency-record";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface CallMachineContext {
  callId: string;
  strict: boolean;
  timestamps: StageTimestamps;
  /** Marks recorded, in arrival order */
  marks: MarkType[];
}

export interface CallMachineInput {
  callId: string;
  startedAt: number;
  strict: boolean;
}

export type CallMarkEvent = { type: MarkType; at: number };

export const MARK_FIELDS = {
  "stt.start": "sttStart",
  "stt.end": "sttEnd",
  "llm.start": "llmStart",
  "llm.end": "llmEnd",
  "tts.start": "ttsStart",
  "tts.end": "ttsEnd",
  "audio.delivered": "audioDelivered",
} as const satisfies Record<MarkType, StageTimestampKey>;

const record = { actions: "recordMark", guard: "isLenient" } as const;

// ═══════════════════════════════════════════════════════════════════════════════
// MACHINE
// ═══════════════════════════════════════════════════════════════════════════════

export const callMachine = setup({
  types: {
    context: {} as CallMachineContext,
    events: {} as CallMarkEvent,
    input: {} as CallMachineInput,
  },

  guards: {
    isLenient: ({ context }) => !context.strict,
  },

  actions: {
    recordMark: assign(({ context, event }) => ({
      timestamps: { ...context.timestamps, [MARK_FIELDS[event.type]]: event.at },
      marks: [...context.marks, event.type],
    })),
  },
}).createMachine({
  id: "call",
  context: ({ input }) => ({
    callId: input.callId,
    strict: input.strict,
    timestamps: createStageTimestamps(input.startedAt),
    marks: [],
  }),
  initial: "speaking",

  on: {
    "stt.start": record,
    "stt.end": record,
    "llm.start": record,
    "llm.end": record,
    "tts.start": record,
    "tts.end": record,
    "audio.delivered": record,
  },

  states: {
    speaking: {
      on: { "stt.start": { target: "transcribing", actions: "recordMark" } },
    },
    transcribing: {
      on: { "stt.end": { target: "transcribed", actions: "recordMark" } },
    },
    transcribed: {
      on: { "llm.start": { target: "thinking", actions: "recordMark" } },
    },
    thinking: {
      on: { "llm.end": { target: "responded", actions: "recordMark" } },
    },
    responded: {
      on: { "tts.start": { target: "synthesizing", actions: "recordMark" } },
    },
    synthesizing: {
      on: {
        "tts.end": { target: "synthesized", actions: "recordMark" },
        // first audio reached the caller while synthesis is still running
        "audio.delivered": { target: "streaming", actions: "recordMark" },
      },
    },
    streaming: {
      on: { "tts.end": { target: "delivered", actions: "recordMark" } },
    },
    synthesized: {
      on: { "audio.delivered": { target: "delivered", actions: "recordMark" } },
    },
    delivered: {
      on: { "stt.start": { target: "transcribing", actions: "recordMark" } },
    },
  },
});

export const CALL_PHASES = [
  "speaking",
  "transcribing",
  "transcribed",
  "thinking",
  "responded",
  "synthesizing",
  "streaming",
  "synthesized",
  "delivered",
] as const;

export type CallPhase = (typeof CALL_PHASES)[number];

export function isCallPhase(value: unknown): value is CallPhase {
  return typeof value === "string" && (CALL_PHASES as readonly string[]).includes(value);
}
