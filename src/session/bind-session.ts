/**
 * Session Binding
 *
 * Adapts the callbacks a voice session runtime fires (STT started, TTS
 * finished, ...) onto the tracker's marks for one call, so session code holds
 * a handle for its call instead of repeating the call id everywhere.
 */

import { nanoid } from "nanoid";

import type { CallTracker, MarkResult } from "../tracker/call-tracker";
import type { QualitySample } from "../types/metrics";

/**
 * Handlers for one call's session events.
 */
export interface SessionHooks {
  readonly callId: string;
  onSttStarted(): MarkResult;
  onSttCompleted(): MarkResult;
  onLlmStarted(): MarkResult;
  onLlmCompleted(): MarkResult;
  onTtsStarted(): MarkResult;
  /**
   * Synthesis finished: marks TTS end, and audio delivered unless
   * `onAudioDelivered` already marked it for this turn.
   */
  onTtsCompleted(): MarkResult;
  /** First audio reached the caller before synthesis finished. */
  onAudioDelivered(): MarkResult;
  /** The session could not be set up; counted without touching the call. */
  onSetupFailed(): void;
  /** End the call with optional quality readings. */
  end(quality?: QualitySample): MarkResult;
}

/** Call id for sessions whose room or SIP leg has none of its own. */
export function createCallId(prefix = "call"): string {
  return `${prefix}_${nanoid(12)}`;
}

/**
 * Start tracking `callId` and return the hooks for its session.
 */
export function bindSession(tracker: CallTracker, callId: string = createCallId()): SessionHooks {
  tracker.startCall(callId);

  return {
    callId,
    onSttStarted: () => tracker.markSttStart(callId),
    onSttCompleted: () => tracker.markSttEnd(callId),
    onLlmStarted: () => tracker.markLlmStart(callId),
    onLlmCompleted: () => tracker.markLlmEnd(callId),
    onTtsStarted: () => tracker.markTtsStart(callId),
    onTtsCompleted: () => {
      const streaming = tracker.getPhase(callId) === "streaming";
      const ended = tracker.markTtsEnd(callId);
      if (!ended.ok || streaming) return ended;
      return tracker.markAudioDelivered(callId);
    },
    onAudioDelivered: () => tracker.markAudioDelivered(callId),
    onSetupFailed: () => tracker.recordFailedCallSetup(),
    end: (quality) => tracker.endCall(callId, quality),
  };
}

/**
 * Mark LLM start and end around a generation. The end is marked whether the
 * generation resolves or rejects; a rejection is rethrown.
 */
export async function instrumentLlm<T>(
  tracker: CallTracker,
  callId: string,
  generate: () => Promise<T>,
): Promise<T> {
  tracker.markLlmStart(callId);
  try {
    return await generate();
  } finally {
    tracker.markLlmEnd(callId);
  }
}
