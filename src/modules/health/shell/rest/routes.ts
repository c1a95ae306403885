/**
 * Health check routes
 * Provides liveness and readiness endpoints for Kubernetes probes
 *
 * Endpoints:
 * - GET /healthz      - Minimal probe for load balancers
 * - GET /health       - Alias of the liveness probe
 * - GET /health/live  - Liveness probe (is the process alive?)
 * - GET /health/ready - Readiness probe (is the service ready to accept traffic?)
 */

import {
  LivenessResponseSchema,
  OkResponseSchema,
  ReadinessResponseSchema,
  type LivenessResponse,
  type OkResponse,
  type ReadinessResponse,
} from '../../core/types.js';
import { getReadiness, type GetReadinessDeps } from '../../core/usecases/get-readiness.js';

import type { FastifyPluginAsync } from 'fastify';

/**
 * Factory function to create health routes with dependencies
 */
export const makeHealthRoutes = (deps: Partial<GetReadinessDeps> = {}): FastifyPluginAsync => {
  const { version, checkers = [] } = deps;
  const startTime = Date.now();

  return async (fastify) => {
    fastify.get<{ Reply: OkResponse }>(
      '/healthz',
      {
        schema: {
          response: {
            200: OkResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        return reply.status(200).send({ ok: true });
      }
    );

    /**
     * GET /health/live - Liveness probe
     *
     * Should always return 200 unless the process is completely dead.
     * Does NOT check dependencies - that is the readiness probe's job.
     */
    for (const path of ['/health', '/health/live']) {
      fastify.get<{ Reply: LivenessResponse }>(
        path,
        {
          schema: {
            response: {
              200: LivenessResponseSchema,
            },
          },
        },
        async (_request, reply) => {
          return reply.status(200).send({ status: 'ok' });
        }
      );
    }

    /**
     * GET /health/ready - Readiness probe
     *
     * Checks that the database is reachable and carries the service tables.
     * Returns 503 if any check fails.
     * Kubernetes will stop sending traffic but will NOT restart the pod.
     */
    fastify.get<{ Reply: ReadinessResponse }>(
      '/health/ready',
      {
        schema: {
          response: {
            200: ReadinessResponseSchema,
            503: ReadinessResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const uptimeSeconds = Math.floor((Date.now() - startTime) / 1000);
        const timestamp = new Date().toISOString();

        const response = await getReadiness(
          { version, checkers },
          { uptime: uptimeSeconds, timestamp }
        );

        const httpStatus = response.status === 'unhealthy' ? 503 : 200;

        return reply.status(httpStatus).send(response);
      }
    );
  };
};
