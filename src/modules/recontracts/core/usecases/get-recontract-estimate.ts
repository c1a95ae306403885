/**
 * Use case: Get a re-contract estimate with its supply points and plants.
 */

import { err, ok, type Result } from 'neverthrow';

import { createEstimateNotFoundError, type RecontractError } from '../errors.js';

import type { RecontractRepository } from '../ports.js';
import type { RecontractEstimate } from '../types.js';

export interface GetRecontractEstimateDeps {
  recontractRepo: RecontractRepository;
}

export const getRecontractEstimate = async (
  deps: GetRecontractEstimateDeps,
  estimateId: number
): Promise<Result<RecontractEstimate, RecontractError>> => {
  const result = await deps.recontractRepo.findById(estimateId);
  if (result.isErr()) {
    return err(result.error);
  }

  if (result.value === null) {
    return err(createEstimateNotFoundError(estimateId));
  }

  return ok(result.value);
};
