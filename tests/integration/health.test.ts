/**
 * Integration tests for health endpoints
 */

import { describe, expect, it, afterEach } from 'vitest';

import { createApp } from '@/app/build-app.js';
import { makeDbHealthChecker } from '@/modules/health/index.js';

import {
  makeHealthChecker,
  makeSlowHealthChecker,
  makeFailingHealthChecker,
} from '../fixtures/builders.js';
import { makeTestAppDeps } from '../fixtures/fakes.js';
import { createTestDatabase } from '../infra/test-db.js';

import type { HealthChecker } from '@/modules/health/index.js';
import type { FastifyInstance } from 'fastify';

describe('Health Endpoints', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  const start = async (
    healthCheckers: HealthChecker[] = [],
    version?: string
  ): Promise<FastifyInstance> => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: makeTestAppDeps({ healthCheckers }),
      version,
    });
    return app;
  };

  describe('liveness probes', () => {
    it('GET /healthz returns { ok: true }', async () => {
      const server = await start();

      const response = await server.inject({ method: 'GET', url: '/healthz' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ ok: true });
    });

    it.each(['/health', '/health/live'])('GET %s returns status ok', async (url) => {
      const server = await start();

      const response = await server.inject({ method: 'GET', url });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: 'ok' });
    });

    it('does not run dependency checks', async () => {
      const server = await start([makeFailingHealthChecker('database down')]);

      const response = await server.inject({ method: 'GET', url: '/healthz' });

      expect(response.statusCode).toBe(200);
    });
  });

  describe('GET /health/ready', () => {
    it('returns 200 when no health checkers are configured', async () => {
      const server = await start();

      const response = await server.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.status).toBe('ok');
      expect(body.checks).toEqual([]);
      expect(typeof body.timestamp).toBe('string');
      expect(body.uptime).toBeGreaterThanOrEqual(0);
    });

    it('returns 200 with the database check when it passes', async () => {
      const server = await start([makeHealthChecker({ name: 'database', status: 'healthy' })]);

      const response = await server.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      expect(response.json().checks).toEqual([{ name: 'database', status: 'healthy' }]);
    });

    it('returns 503 when the database check fails', async () => {
      const server = await start([
        makeHealthChecker({
          name: 'database',
          status: 'unhealthy',
          message: 'Connection refused',
        }),
      ]);

      const response = await server.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(503);
      const body = response.json();
      expect(body.status).toBe('unhealthy');
      expect(body.checks[0]).toEqual({
        name: 'database',
        status: 'unhealthy',
        message: 'Connection refused',
      });
    });

    it('returns 503 when a checker throws', async () => {
      const server = await start([makeFailingHealthChecker('Connection timeout')]);

      const response = await server.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(503);
      expect(response.json().checks[0]).toMatchObject({
        name: 'unknown',
        status: 'unhealthy',
        message: 'Connection timeout',
      });
    });

    it('includes latency when provided by checker', async () => {
      const server = await start([makeSlowHealthChecker(10, { name: 'database' })]);

      const response = await server.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      expect(response.json().checks[0].latencyMs).toBeGreaterThanOrEqual(9);
    });

    it('returns 503 naming the tables when the schema was never applied', async () => {
      const empty = await createTestDatabase({ withSchema: false });
      try {
        const server = await start([
          makeDbHealthChecker(empty.db, { name: 'database', tables: ['plans', 'ppa_bundles'] }),
        ]);

        const response = await server.inject({ method: 'GET', url: '/health/ready' });

        expect(response.statusCode).toBe(503);
        expect(response.json().status).toBe('unhealthy');
        expect(response.json().checks[0]).toMatchObject({
          name: 'database',
          status: 'unhealthy',
          message: 'Missing tables: plans, ppa_bundles',
        });
      } finally {
        await empty.close();
      }
    }, 30_000);

    it('includes version when provided', async () => {
      const server = await start([], '1.2.3');

      const response = await server.inject({ method: 'GET', url: '/health/ready' });

      expect(response.json().version).toBe('1.2.3');
    });
  });
});
