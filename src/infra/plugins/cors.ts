/**
 * CORS plugin for Fastify
 * Configures Cross-Origin Resource Sharing with environment-based allowed origins
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

/**
 * Get the set of allowed origins from configuration
 */
export function getAllowedOriginsSet(config: AppConfig): Set<string> {
  const set = new Set<string>();

  if (config.cors.allowedOrigins !== undefined && config.cors.allowedOrigins !== '') {
    config.cors.allowedOrigins
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '')
      .forEach((u) => set.add(u));
  }

  if (config.cors.clientBaseUrl !== undefined && config.cors.clientBaseUrl !== '') {
    set.add(config.cors.clientBaseUrl.trim());
  }

  return set;
}

export function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }

    // Match hostnames exactly (avoid `startsWith('http://localhost')` pitfalls)
    return url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]';
  } catch {
    return false;
  }
}

/**
 * Rejection passed to the CORS callback; the global error handler sends it as 403.
 */
export class CorsOriginError extends Error {
  readonly statusCode = 403;

  constructor(origin: string) {
    super(`CORS origin not allowed: ${origin}`);
    this.name = 'CorsOriginError';
  }
}

/**
 * Register CORS plugin with Fastify
 */
export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = getAllowedOriginsSet(config);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Server-to-server and same-origin requests carry no Origin header
      if (origin === undefined || origin === '') {
        cb(null, true);
        return;
      }

      if (allowedOrigins.has(origin)) {
        cb(null, true);
        return;
      }

      // The local dashboard dev servers run on localhost
      if (config.server.isDevelopment && isLocalhostOrigin(origin)) {
        cb(null, true);
        return;
      }

      cb(new CorsOriginError(origin), false);
    },
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['content-type', 'authorization', 'accept', 'x-requested-with'],
    credentials: true,
  });
}
