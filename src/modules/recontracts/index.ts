/**
 * Recontracts Module - Public API
 *
 * Re-contract estimate creation (with the contract status transition it
 * triggers) and retrieval.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Repository
// ─────────────────────────────────────────────────────────────────────────────
export { makeRecontractRepo, type RecontractRepoOptions } from './shell/repo/recontracts-repo.js';
export type { RecontractRepository } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────
export {
  createRecontractEstimate,
  type CreateRecontractEstimateDeps,
} from './core/usecases/create-recontract-estimate.js';
export {
  getRecontractEstimate,
  type GetRecontractEstimateDeps,
} from './core/usecases/get-recontract-estimate.js';
export { validateRecontractEstimate, IMPLICIT_PLANT, roundCapacity } from './core/validation.js';

// ─────────────────────────────────────────────────────────────────────────────
// REST
// ─────────────────────────────────────────────────────────────────────────────
export { makeRecontractRoutes, type MakeRecontractRoutesDeps } from './shell/rest/routes.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export type {
  CreateRecontractEstimateInput,
  CreatedRecontractEstimate,
  NewRecontractEstimate,
  RecontractEstimate,
  RecontractPlant,
  RecontractPlantInput,
  RecontractSupplyPoint,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────
export type { RecontractError, EstimateNotFoundError } from './core/errors.js';
export {
  createConstraintViolationError,
  createEstimateNotFoundError,
  createInvalidReferenceError,
} from './core/errors.js';
