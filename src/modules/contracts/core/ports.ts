import type { ContractsError } from './errors.js';
import type { RenewalCase, RenewalWindow } from './types.js';
import type { Result } from 'neverthrow';

export interface ContractsRepository {
  /**
   * UNDER_CONTRACT contracts whose end date falls in the window, ordered by
   * end date then id.
   */
  listRenewalCases(window: RenewalWindow): Promise<Result<RenewalCase[], ContractsError>>;
}
