import type { HealthCheckResult, OverallStatus } from './types.js';

/**
 * Turns settled checker promises into results. A checker that rejects is
 * reported as an unhealthy check named 'unknown'.
 */
export const mapCheckResults = (
  results: PromiseSettledResult<HealthCheckResult>[]
): HealthCheckResult[] => {
  return results.map((result) => {
    if (result.status === 'fulfilled') {
      return result.value;
    }
    return {
      name: 'unknown',
      status: 'unhealthy',
      message: result.reason instanceof Error ? result.reason.message : 'Check failed',
    };
  });
};

/**
 * Any unhealthy check makes the service unhealthy (503).
 */
export const determineOverallStatus = (checks: HealthCheckResult[]): OverallStatus =>
  checks.some((check) => check.status === 'unhealthy') ? 'unhealthy' : 'ok';
