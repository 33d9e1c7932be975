import { describe, expect, it } from "vitest";
import { SimulatedClock } from "xstate";

import { loadConfigFromEnv } from "../../../src/config/env";
import { ConfigError } from "../../../src/errors";
import { resolveConfig } from "../../../src/types/config";

describe("loadConfigFromEnv", () => {
  it("leaves unset variables undefined", () => {
    expect(loadConfigFromEnv({})).toEqual({
      metricsPort: undefined,
      metricsHost: undefined,
      metricPrefix: undefined,
      latencyTargetMs: undefined,
      systemSampleIntervalMs: undefined,
      strict: undefined,
      logLevel: undefined,
    });
  });

  it("parses every supported variable", () => {
    const config = loadConfigFromEnv({
      METRICS_PORT: "9464",
      METRICS_HOST: "127.0.0.1",
      METRICS_PREFIX: "support_line",
      LATENCY_TARGET_MS: "750",
      SYSTEM_SAMPLE_INTERVAL_MS: "10000",
      STRICT_CALL_TRACKING: "true",
      LOG_LEVEL: "debug",
    });

    expect(config).toEqual({
      metricsPort: 9464,
      metricsHost: "127.0.0.1",
      metricPrefix: "support_line",
      latencyTargetMs: 750,
      systemSampleIntervalMs: 10_000,
      strict: true,
      logLevel: "debug",
    });
  });

  it("accepts 0 as false for strict tracking", () => {
    expect(loadConfigFromEnv({ STRICT_CALL_TRACKING: "0" }).strict).toBe(false);
  });

  it("reports every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfigFromEnv({ METRICS_PORT: "70000", METRICS_PREFIX: "9-bad", LOG_LEVEL: "loud" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toHaveLength(3);
      expect(caught.issues[0]).toMatch(/^METRICS_PORT: /);
      expect(caught.issues[1]).toBe("METRICS_PREFIX: must be a valid Prometheus metric name");
      expect(caught.issues[2]).toMatch(/^LOG_LEVEL: /);
    }
  });
});

describe("resolveConfig", () => {
  it("fills in defaults", () => {
    const resolved = resolveConfig();

    expect(resolved).toMatchObject({
      metricsPort: 8000,
      metricsHost: "0.0.0.0",
      serveMetrics: true,
      metricPrefix: "voice_agent",
      collectDefaultMetrics: false,
      latencyTargetMs: 600,
      historyCapacity: 1000,
      statsWindow: 100,
      sampleSystem: true,
      systemSampleIntervalMs: 5000,
      strict: false,
      logLevel: "info",
    });
    expect(typeof resolved.now()).toBe("number");
  });

  it("keeps explicit values from the environment loader", () => {
    const resolved = resolveConfig(loadConfigFromEnv({ METRICS_PORT: "9100" }));

    expect(resolved.metricsPort).toBe(9100);
    expect(resolved.latencyTargetMs).toBe(600);
  });

  it("reads stage timestamps from the simulated clock, offset past the unset sentinel", () => {
    const simulatedClock = new SimulatedClock();
    simulatedClock.increment(1_234);

    expect(resolveConfig({ simulatedClock }).now()).toBe(2_234);
  });
});
