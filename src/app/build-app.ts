/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { registerCors } from '../infra/plugins/index.js';
import { makeContractRoutes, type ContractsRepository } from '../modules/contracts/index.js';
import { makeHealthRoutes, type HealthChecker } from '../modules/health/index.js';
import {
  makePpaQuotationRoutes,
  type PpaQuotationRepository,
} from '../modules/ppa-quotations/index.js';
import { makeRecontractRoutes, type RecontractRepository } from '../modules/recontracts/index.js';

import type { ErrorResponseBody } from '../common/types/errors.js';
import type { AppConfig } from '../infra/config/env.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  healthCheckers?: HealthChecker[];
  ppaQuotationRepo: PpaQuotationRepository;
  recontractRepo: RecontractRepository;
  contractsRepo: ContractsRepository;
  /** Clock for date-relative rules (quote window, renewal month) */
  now?: () => Date;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps, version } = options;
  const { config, ppaQuotationRepo, recontractRepo, contractsRepo, now } = deps;

  const app = fastifyLib({
    ...fastifyOptions,
  });

  await registerCors(app, config);

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Handle validation errors
    if (error.validation != null) {
      request.log.info({ validation: error.validation }, 'Request validation failed');
      const body: ErrorResponseBody = {
        ok: false,
        error: 'ValidationError',
        message: error.message,
      };
      return reply.status(400).send(body);
    }

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      request.log.warn({ err: error }, 'Request error');
      const body: ErrorResponseBody = { ok: false, error: error.name, message: error.message };
      return reply.status(error.statusCode).send(body);
    }

    request.log.error({ err: error }, 'Request error');
    const body: ErrorResponseBody = {
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    };
    return reply.status(500).send(body);
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    const body: ErrorResponseBody = {
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    };
    return reply.status(404).send(body);
  });

  // Handlers above are captured by every route registered below
  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: deps.healthCheckers ?? [],
    })
  );

  await app.register(makePpaQuotationRoutes({ ppaQuotationRepo }));
  await app.register(makeRecontractRoutes({ recontractRepo, ...(now !== undefined && { now }) }));
  await app.register(makeContractRoutes({ contractsRepo, ...(now !== undefined && { now }) }));

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
