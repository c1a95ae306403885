/**
 * Use case: Create a re-contract estimate.
 *
 * validate → persist header and children → transition matching contracts →
 * commit → reload. Everything after validation happens in the repository
 * transaction.
 */

import { err, type Result } from 'neverthrow';

import { validateRecontractEstimate } from '../validation.js';

import type { RecontractError } from '../errors.js';
import type { RecontractRepository } from '../ports.js';
import type { CreateRecontractEstimateInput, CreatedRecontractEstimate } from '../types.js';

export interface CreateRecontractEstimateDeps {
  recontractRepo: RecontractRepository;
}

export const createRecontractEstimate = async (
  deps: CreateRecontractEstimateDeps,
  input: CreateRecontractEstimateInput,
  today: string
): Promise<Result<CreatedRecontractEstimate, RecontractError>> => {
  const validated = validateRecontractEstimate(input, today);
  if (validated.isErr()) {
    return err(validated.error);
  }

  return deps.recontractRepo.create(validated.value);
};
