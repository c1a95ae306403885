/**
 * Contracts Module - Public API
 */

export { makeContractsRepo, type ContractsRepoOptions } from './shell/repo/contracts-repo.js';
export type { ContractsRepository } from './core/ports.js';
export { listRenewalCases, type ListRenewalCasesDeps } from './core/usecases/list-renewal-cases.js';
export { computeRenewalWindow } from './core/renewal-window.js';
export { makeContractRoutes, type MakeContractRoutesDeps } from './shell/rest/routes.js';
export type { RenewalCase, RenewalWindow } from './core/types.js';
export { RENEWAL_LOOKAHEAD_DAYS } from './core/types.js';
export type { ContractsError } from './core/errors.js';
