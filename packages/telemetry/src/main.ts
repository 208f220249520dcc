/**
 * @file main.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { readFileSync } from "fs";
import { createApp, type TlsMaterial } from "./app.js";
import { getEnv, getTlsPaths, type Env } from "./config/env.js";
import { CONNECTION_TIMING, WEBSOCKET_CONFIG, PERMISSIONS } from "./config/constants.js";
import { getRelayVersion } from "./utils/version.js";
import { TransportInitError } from "./domain/errors/domain-errors.js";
import { createLogger } from "./infrastructure/logging/pino-logger.js";
import { LogBridge } from "./infrastructure/logging/log-bridge.js";
import { resolveLogLevel } from "./infrastructure/logging/log-level.js";
import { InMemoryConnectionRegistry } from "./infrastructure/persistence/in-memory-registry.js";
import { BoundedSampleQueue } from "./infrastructure/persistence/bounded-sample-queue.js";
import { PeriodogramEstimator } from "./infrastructure/dsp/periodogram-estimator.js";
import { SweepSignalSource } from "./infrastructure/signal/sweep-signal-source.js";
import { registerHealthRoute } from "./infrastructure/http/health-route.js";
import {
  ConnectionHandler,
  ReactorPulse,
  WebSocketServerWrapper,
  WsTransport,
} from "./infrastructure/websocket/index.js";
import {
  BroadcastRouter,
  CommandDispatcher,
  ConnectionLifecycle,
  StreamingWorker,
  createLogSubscriptionHandler,
} from "./application/index.js";

/**
 * Prints the startup banner to console.
 */
function printBanner(version: string): void {
  const dim = "\x1b[2m";
  const white = "\x1b[97m";
  const reset = "\x1b[0m";

  const banner = `
       ${white}S D R   T E L E M E T R Y   R E L A Y${reset}
       ${dim}Spectrum and log fan-out over WebSocket${reset}

       ${dim}v${version}${reset}
`;
  process.stdout.write(banner);
}

function readTls(env: Env): TlsMaterial | undefined {
  const paths = getTlsPaths(env);
  if (!paths) {
    return undefined;
  }
  try {
    return { cert: readFileSync(paths.certPath), key: readFileSync(paths.keyPath) };
  } catch (error) {
    throw new TransportInitError(
      `cannot read TLS material: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Bootstraps and starts the relay.
 */
async function bootstrap(): Promise<void> {
  const version = getRelayVersion();
  printBanner(version);

  // Load configuration
  const env = getEnv();

  // The bridge exists before the logger; it forwards nothing until installed
  const logBridge = new LogBridge();
  const logger = createLogger({
    name: "sdr-telemetry",
    level: resolveLogLevel(env.LOG_VERBOSITY),
    pretty: env.NODE_ENV === "development",
    bridge: logBridge,
  });

  const wsPath = env.WS_PATH || WEBSOCKET_CONFIG.PATH;

  logger.info(
    {
      version,
      nodeEnv: env.NODE_ENV,
      port: env.PORT,
      nfft: env.NFFT,
      sampleSource: env.SAMPLE_SOURCE,
    },
    "Starting telemetry relay"
  );

  // Fan-out core
  const pulse = new ReactorPulse();
  const registry = new InMemoryConnectionRegistry(logger);
  const lifecycle = new ConnectionLifecycle({
    registry,
    defaultPermissions: env.DEFAULT_PERMISSIONS,
    logger,
  });
  const transport = new WsTransport(
    {
      highWaterMark: WEBSOCKET_CONFIG.SEND_HIGH_WATER_MARK,
      drainRetryMs: CONNECTION_TIMING.DRAIN_RETRY_MS,
    },
    logger
  );
  const router = new BroadcastRouter({ registry, transport, lifecycle, logger });
  logBridge.install(router);

  const dispatcher = new CommandDispatcher(logger);
  if (env.ALLOW_LOG_SUBSCRIPTION) {
    dispatcher.register(PERMISSIONS.LOGS, createLogSubscriptionHandler(router));
  }

  // Spectrum pipeline
  const queue = new BoundedSampleQueue(env.QUEUE_CAPACITY);
  const worker = new StreamingWorker(
    {
      nfft: env.NFFT,
      lowWaterMark: env.QUEUE_LOW_WATER_MARK,
      waitTimeoutMs: env.WORKER_WAIT_TIMEOUT_MS,
      centerFrequency: env.CENTER_FREQUENCY_HZ,
      span: env.SPAN_HZ,
    },
    {
      queue,
      estimator: new PeriodogramEstimator(env.NFFT),
      broadcaster: router,
      pulse,
      logger,
    }
  );
  lifecycle.addObserver(worker);

  const sweep =
    env.SAMPLE_SOURCE === "sweep"
      ? new SweepSignalSource(
          { batchSize: env.SWEEP_BATCH_SIZE, intervalMs: env.SWEEP_INTERVAL_MS },
          { queue, logger }
        )
      : null;

  const connectionHandler = new ConnectionHandler({
    lifecycle,
    router,
    dispatcher,
    transport,
    pulse,
    logger,
  });

  const app = createApp({ logger, tls: readTls(env) });
  registerHealthRoute(app, { version }, { registry, worker, queue });

  const wsServer = new WebSocketServerWrapper(
    { path: wsPath, heartbeatIntervalMs: env.HEARTBEAT_INTERVAL_MS },
    { connectionHandler, logger }
  );

  // Start server
  try {
    await app.listen({ port: env.PORT, host: env.HOST });
    wsServer.attach(app.server);
  } catch (error) {
    const initError =
      error instanceof TransportInitError
        ? error
        : new TransportInitError(error instanceof Error ? error.message : String(error));
    logger.fatal({ error: initError.toJSON() }, "Failed to start server");
    process.exit(1);
  }

  worker.start().catch((error: unknown) => {
    // The relay keeps serving logs and health after a pipeline failure
    logger.fatal({ error }, "Spectrum worker stopped");
  });
  sweep?.start();

  logger.info(
    {
      address: `${getTlsPaths(env) ? "https" : "http"}://${env.HOST}:${env.PORT}`,
      wsPath,
    },
    "Telemetry relay is running"
  );

  // Graceful shutdown with overall timeout
  const SHUTDOWN_TIMEOUT_MS = 10_000;

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");

    // Force exit after timeout
    const forceExitTimer = setTimeout(() => {
      logger.error("Shutdown timed out, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
      sweep?.stop();
      worker.terminate();
      await worker.waitForTermination();

      // Close WebSocket server first (has its own timeout)
      await wsServer.close(CONNECTION_TIMING.CLOSE_TIMEOUT_MS);
      logBridge.uninstall();

      // Close HTTP server
      await app.close();

      clearTimeout(forceExitTimer);
      logger.info("Shutdown complete");
      process.exit(0);
    } catch (error) {
      clearTimeout(forceExitTimer);
      logger.error({ error }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  // Unhandled rejection handler
  process.on("unhandledRejection", (reason, promise) => {
    logger.error({ reason, promise }, "Unhandled rejection");
  });

  // Uncaught exception handler
  process.on("uncaughtException", (error) => {
    logger.fatal({ error }, "Uncaught exception");
    process.exit(1);
  });
}

// Run the server
bootstrap().catch((error: unknown) => {
  console.error("Failed to bootstrap:", error);
  process.exit(1);
});
