/**
 * @file app.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import Fastify, { type FastifyError } from 'fastify';
import { createServer as createHttpServer, type Server } from 'http';
import { createServer as createHttpsServer } from 'https';
import type { Logger } from 'pino';

export interface TlsMaterial {
  cert: Buffer;
  key: Buffer;
}

export interface AppConfig {
  logger: Logger;
  /** Serve HTTPS (and so wss://) when set */
  tls?: TlsMaterial;
}

/**
 * Creates and configures the Fastify application.
 */
export function createApp(config: AppConfig) {
  const { tls } = config;
  const app = Fastify({
    loggerInstance: config.logger,
    // Disable request logging since we use pino directly
    disableRequestLogging: true,
    serverFactory: (handler): Server =>
      tls ? createHttpsServer({ cert: tls.cert, key: tls.key }, handler) : createHttpServer(handler),
  });

  // Request logging middleware
  app.addHook('onRequest', async (request, _reply) => {
    request.log.debug({ method: request.method, url: request.url }, 'Incoming request');
  });

  // Response logging middleware
  app.addHook('onResponse', async (request, reply) => {
    request.log.debug(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed'
    );
  });

  // Error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ error }, 'Request error');
    const statusCode = error.statusCode ?? 500;
    const code = error.code || 'INTERNAL_ERROR';
    void reply.status(statusCode).send({
      error: error.message,
      code,
    });
  });

  app.setNotFoundHandler((request, reply) => {
    request.log.warn({ url: request.url }, 'Route not found');
    void reply.status(404).send({
      error: 'Not Found',
      code: 'NOT_FOUND',
    });
  });

  return app;
}

export type App = ReturnType<typeof createApp>;
