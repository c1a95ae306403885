/**
 * Health module exports
 */

export { makeHealthRoutes } from './shell/rest/routes.js';
export { makeDbHealthChecker, type DbHealthCheckerOptions } from './shell/checkers/index.js';
export { getReadiness, type GetReadinessDeps } from './core/usecases/get-readiness.js';

// Types
export type { HealthChecker } from './core/ports.js';
export type { HealthCheckResult, LivenessResponse, ReadinessResponse } from './core/types.js';
