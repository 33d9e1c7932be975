import { z } from "zod";

import { ConfigError } from "../errors";
import type { CallMetricsConfig } from "../types/config";

const booleanString = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

export const EnvSchema = z.object({
  METRICS_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  METRICS_HOST: z.string().min(1).optional(),
  METRICS_PREFIX: z
    .string()
    .regex(/^[a-zA-Z_:][a-zA-Z0-9_:]*$/, "must be a valid Prometheus metric name")
    .optional(),
  LATENCY_TARGET_MS: z.coerce.number().positive().optional(),
  SYSTEM_SAMPLE_INTERVAL_MS: z.coerce.number().int().min(100).optional(),
  STRICT_CALL_TRACKING: booleanString.optional(),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).optional(),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Reads the metrics configuration from environment variables.
 * Unset variables fall back to the defaults applied by `resolveConfig`.
 *
 * @throws {ConfigError} listing every variable that failed to parse
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): CallMetricsConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const parsed = result.data;
  return {
    metricsPort: parsed.METRICS_PORT,
    metricsHost: parsed.METRICS_HOST,
    metricPrefix: parsed.METRICS_PREFIX,
    latencyTargetMs: parsed.LATENCY_TARGET_MS,
    systemSampleIntervalMs: parsed.SYSTEM_SAMPLE_INTERVAL_MS,
    strict: parsed.STRICT_CALL_TRACKING,
    logLevel: parsed.LOG_LEVEL,
  };
}
