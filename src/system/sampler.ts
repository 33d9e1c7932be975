/**
 * System Sampler
 *
 * Periodically reads host CPU and memory usage and pushes them into the sink's
 * gauges.
 *
 * Architecture:
 * - `running` samples on entry and re-enters itself after `interval`
 * - a failed reading is reported through `onError` and the loop goes on
 * - `STOP` (or stopping the actor) cancels the pending delay
 * - delays go through the actor's clock, so a SimulatedClock drives ticks in tests
 */

import {
  type ActorRefFrom,
  type SimulatedClock,
  assign,
  createActor,
  enqueueActions,
  setup,
} from "xstate";

import { toError } from "../errors";
import type { Logger } from "../logging/logger";
import type { MetricsSink } from "../metrics/sink";
import type { CallMetricsEventHandler } from "../types/events";
import type { SystemUsage } from "../types/metrics";
import type { ResourceProbe } from "./probe";

// ═══════════════════════════════════════════════════════════════════════════════
// MACHINE
// ═══════════════════════════════════════════════════════════════════════════════

export interface SamplerMachineInput {
  probe: ResourceProbe;
  intervalMs: number;
  onSample: (usage: SystemUsage) => void;
  onError: (error: Error) => void;
}

export interface SamplerMachineContext extends SamplerMachineInput {
  ticks: number;
  failures: number;
}

export const samplerMachine = setup({
  types: {
    context: {} as SamplerMachineContext,
    events: {} as { type: "STOP" },
    input: {} as SamplerMachineInput,
  },

  actions: {
    sample: enqueueActions(({ context, enqueue }) => {
      let usage: SystemUsage;
      try {
        usage = {
          cpuPercent: context.probe.cpuPercent(),
          memoryMb: context.probe.memoryUsedMb(),
        };
      } catch (error) {
        enqueue.assign({ failures: context.failures + 1 });
        enqueue(() => context.onError(toError(error)));
        return;
      }
      enqueue(() => context.onSample(usage));
    }),
    countTick: assign({ ticks: ({ context }) => context.ticks + 1 }),
  },

  delays: {
    interval: ({ context }) => context.intervalMs,
  },
}).createMachine({
  id: "systemSampler",
  context: ({ input }) => ({ ...input, ticks: 0, failures: 0 }),
  initial: "running",
  states: {
    running: {
      entry: ["countTick", "sample"],
      after: {
        interval: { target: "running", reenter: true },
      },
      on: { STOP: "stopped" },
    },
    stopped: {
      type: "final",
    },
  },
});

// ═══════════════════════════════════════════════════════════════════════════════
// WRAPPER
// ═══════════════════════════════════════════════════════════════════════════════

export interface SystemSamplerOptions {
  sink: MetricsSink;
  probe: ResourceProbe;
  logger: Logger;
  /** @default 5000 */
  intervalMs?: number;
  clock?: SimulatedClock;
  onEvent?: CallMetricsEventHandler;
}

const LOG_META = { component: "system-sampler" } as const;

export class SystemSampler {
  private readonly input: SamplerMachineInput;
  private readonly clock: SimulatedClock | undefined;
  private actor: ActorRefFrom<typeof samplerMachine> | null = null;

  constructor(options: SystemSamplerOptions) {
    const { sink, logger } = options;
    const onEvent = options.onEvent ?? (() => {});

    this.clock = options.clock;
    this.input = {
      probe: options.probe,
      intervalMs: options.intervalMs ?? 5000,
      onSample: (usage) => {
        sink.setSystemUsage(usage);
        onEvent({ type: "system:sampled", usage });
      },
      onError: (error) => {
        logger.error("error updating system metrics", { ...LOG_META, error: error.message });
        onEvent({ type: "system:sample-failed", error });
      },
    };
  }

  /** Take a sample now and keep sampling every interval. Restarts a stopped sampler. */
  start(): void {
    if (this.isRunning) return;
    // the initial entry reads the probe, so the actor only exists once started
    this.actor = createActor(samplerMachine, {
      input: this.input,
      ...(this.clock ? { clock: this.clock } : {}),
    });
    this.actor.start();
  }

  stop(): void {
    if (!this.actor) return;
    this.actor.send({ type: "STOP" });
    this.actor.stop();
  }

  get isRunning(): boolean {
    return this.actor?.getSnapshot().status === "active";
  }

  /** Ticks of the current or last run, failed ones included. */
  get ticks(): number {
    return this.actor?.getSnapshot().context.ticks ?? 0;
  }

  get failures(): number {
    return this.actor?.getSnapshot().context.failures ?? 0;
  }
}
