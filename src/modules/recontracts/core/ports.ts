/**
 * Port interfaces for the recontracts module.
 */

import type { RecontractError } from './errors.js';
import type {
  CreatedRecontractEstimate,
  NewRecontractEstimate,
  RecontractEstimate,
} from './types.js';
import type { Result } from 'neverthrow';

export interface RecontractRepository {
  /**
   * Persists the estimate and its children and moves matching UNDER_CONTRACT
   * contracts to RECONTRACT_ESTIMATE, all in one transaction.
   *
   * Fails with a ValidationError, leaving nothing written, when the plan or
   * customer does not exist or a constraint is violated.
   */
  create(
    estimate: NewRecontractEstimate
  ): Promise<Result<CreatedRecontractEstimate, RecontractError>>;

  findById(id: number): Promise<Result<RecontractEstimate | null, RecontractError>>;
}
