/**
 * Metrics Server
 *
 * Pull-based scrape endpoint for a {@link MetricsSink}.
 *
 * - GET /metrics → Prometheus text exposition
 * - GET /healthz → { status: "ok" }
 * - anything else → 404
 */

import http from "node:http";

import { MetricsServerError, toError } from "../errors";
import type { Logger } from "../logging/logger";
import type { MetricsSink } from "./sink";

export interface MetricsServerOptions {
  port: number;
  host?: string;
  logger: Logger;
}

export interface MetricsServer {
  /** Port actually bound (differs from the requested one when that was 0) */
  readonly port: number;
  close(): Promise<void>;
}

const LOG_META = { component: "metrics-server" } as const;

/**
 * Bind the scrape endpoint.
 *
 * @throws {MetricsServerError} `port-in-use` when the port is already bound,
 * `listen-failed` for any other listen error
 */
export async function startMetricsServer(
  sink: MetricsSink,
  options: MetricsServerOptions,
): Promise<MetricsServer> {
  const { logger } = options;
  const server = http.createServer((req, res) => {
    const path = (req.url ?? "/").split("?")[0];

    if (req.method === "GET" && path === "/metrics") {
      sink
        .metrics()
        .then((body) => {
          res.writeHead(200, { "Content-Type": sink.contentType });
          res.end(body);
        })
        .catch((error: unknown) => {
          logger.error("failed to render metrics", { ...LOG_META, error: toError(error).message });
          res.writeHead(500);
          res.end();
        });
      return;
    }

    if (req.method === "GET" && path === "/healthz") {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ status: "ok" }));
      return;
    }

    res.writeHead(404);
    res.end();
  });

  await new Promise<void>((resolve, reject) => {
    const onError = (error: NodeJS.ErrnoException): void => {
      const kind = error.code === "EADDRINUSE" ? "port-in-use" : "listen-failed";
      reject(new MetricsServerError(kind, options.port, { cause: error }));
    };
    server.once("error", onError);
    server.listen(options.port, options.host, () => {
      server.off("error", onError);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : options.port;
  logger.info("metrics server listening", { ...LOG_META, port });

  return {
    port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      }),
  };
}
