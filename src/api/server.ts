import Fastify from 'fastify';
import type { TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import {
  ErrorResponseSchema,
  HealthResponseSchema,
  SnapshotResponseSchema,
  type SnapshotResponse,
} from './schemas';
import type { PrometheusSink } from '../utils/metrics-sink';
import type { Snapshot } from '../types/usage';
import type { Logger } from '../config/logger';

export interface ServerOptions {
  sink: PrometheusSink;
  logger: Logger;
}

function toResponse(snapshot: Snapshot): SnapshotResponse {
  return {
    tick: snapshot.tick,
    created_at: snapshot.created_at.toISOString(),
    weights: { ...snapshot.weights },
    metrics: snapshot.metrics.map((metric) => ({
      name: metric.name,
      value: metric.value,
      labels: { ...metric.labels },
    })),
  };
}

/**
 * Scrape server. Reads whatever snapshot the sink holds; never waits for the
 * scheduler.
 */
export function buildServer({ sink, logger }: ServerOptions) {
  const app = Fastify({
    loggerInstance: logger,
    disableRequestLogging: true,
  }).withTypeProvider<TypeBoxTypeProvider>();

  /**
   * GET /metrics - Prometheus text exposition of the last snapshot
   */
  app.get('/metrics', async (_request, reply) => {
    const body = await sink.metrics();
    return reply.status(200).header('Content-Type', sink.contentType).send(body);
  });

  /**
   * GET /v1/snapshot - Last published snapshot as JSON
   */
  app.get(
    '/v1/snapshot',
    {
      schema: {
        response: {
          200: SnapshotResponseSchema,
          503: ErrorResponseSchema,
        },
      },
    },
    async (_request, reply) => {
      const snapshot = sink.current();
      if (!snapshot) {
        return reply.status(503).send({ error: 'No snapshot published yet' });
      }
      return reply.status(200).send(toResponse(snapshot));
    }
  );

  // Health check endpoint
  app.get(
    '/health',
    {
      schema: {
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    async () => {
      return { status: 'ok' as const, tick: sink.current()?.tick ?? null };
    }
  );

  return app;
}

export type MetricsServer = ReturnType<typeof buildServer>;
