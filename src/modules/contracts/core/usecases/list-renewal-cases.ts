/**
 * Use case: List contracts due for renewal.
 */

import { computeRenewalWindow } from '../renewal-window.js';

import type { ContractsError } from '../errors.js';
import type { ContractsRepository } from '../ports.js';
import type { RenewalCase } from '../types.js';
import type { Result } from 'neverthrow';

export interface ListRenewalCasesDeps {
  contractsRepo: ContractsRepository;
}

export const listRenewalCases = async (
  deps: ListRenewalCasesDeps,
  today: string
): Promise<Result<RenewalCase[], ContractsError>> => {
  return deps.contractsRepo.listRenewalCases(computeRenewalWindow(today));
};
