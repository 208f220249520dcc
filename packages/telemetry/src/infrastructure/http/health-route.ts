/**
 * @file health-route.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { ConnectionRegistry } from '../../domain/ports/connection-registry.js';
import type { StreamingWorker, WorkerState } from '../../application/streaming-worker.js';
import type { BoundedSampleQueue } from '../persistence/bounded-sample-queue.js';

export interface HealthRouteConfig {
  version: string;
}

export interface HealthRouteDeps {
  registry: Pick<ConnectionRegistry, 'count'>;
  worker: Pick<StreamingWorker, 'state' | 'subscribers' | 'stats'>;
  queue: Pick<BoundedSampleQueue, 'size' | 'capacity' | 'droppedCount'>;
}

export interface HealthResponse {
  status: 'healthy' | 'degraded';
  version: string;
  uptime: number;
  connections: number;
  worker: {
    state: WorkerState;
    subscribers: number;
    frames: number;
  };
  queue: {
    depth: number;
    capacity: number;
    dropped: number;
  };
  timestamp: string;
}

interface AppWithGet {
  get: (path: string, handler: (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>) => unknown;
}

/**
 * Registers the health check routes on the Fastify server.
 * The service is degraded once the spectrum worker has stopped.
 */
export function registerHealthRoute(
  app: AppWithGet,
  config: HealthRouteConfig,
  deps: HealthRouteDeps
): void {
  const startTime = Date.now();

  app.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const state = deps.worker.state;
    const response: HealthResponse = {
      status: state === 'running' ? 'healthy' : 'degraded',
      version: config.version,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      connections: deps.registry.count(),
      worker: {
        state,
        subscribers: deps.worker.subscribers,
        frames: deps.worker.stats.frames,
      },
      queue: {
        depth: deps.queue.size,
        capacity: deps.queue.capacity,
        dropped: deps.queue.droppedCount,
      },
      timestamp: new Date().toISOString(),
    };

    return reply.status(200).send(response);
  });

  // Simple liveness check
  app.get('/healthz', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'ok' });
  });

  // Readiness check: ready while the worker is producing frames
  app.get('/readyz', async (_request: FastifyRequest, reply: FastifyReply) => {
    if (deps.worker.state !== 'running') {
      return reply.status(503).send({ status: 'not_ready', worker: deps.worker.state });
    }
    return reply.status(200).send({ status: 'ready' });
  });
}
