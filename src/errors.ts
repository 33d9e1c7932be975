/**
 * Error types raised or returned by the metrics subsystem.
 */

export type CallTrackingErrorKind = "stale-or-missing-mark" | "duplicate-call";

/**
 * Returned, never thrown, by call tracker operations that could not be applied.
 */
export class CallTrackingError extends Error {
  override readonly name = "CallTrackingError";

  constructor(
    readonly kind: CallTrackingErrorKind,
    readonly callId: string,
    message: string,
  ) {
    super(message);
  }
}

export type MetricsServerErrorKind = "port-in-use" | "listen-failed";

/**
 * Thrown when the metrics endpoint cannot be bound.
 */
export class MetricsServerError extends Error {
  override readonly name = "MetricsServerError";

  constructor(
    readonly kind: MetricsServerErrorKind,
    readonly port: number,
    options?: { cause?: unknown },
  ) {
    super(
      kind === "port-in-use"
        ? `Metrics port ${port} is already in use`
        : `Failed to start metrics server on port ${port}`,
      options,
    );
  }
}

/**
 * Thrown when environment configuration does not parse.
 */
export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
