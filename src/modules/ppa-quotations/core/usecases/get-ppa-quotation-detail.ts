/**
 * Use case: Get one PPA quotation bundle with per-project rollups.
 */

import { err, ok, type Result } from 'neverthrow';

import { createBundleNotFoundError, type PpaQuotationError } from '../errors.js';
import { toDetail } from '../presentation.js';

import type { PpaQuotationRepository } from '../ports.js';
import type { PpaQuotationDetail } from '../types.js';

export interface GetPpaQuotationDetailDeps {
  ppaQuotationRepo: PpaQuotationRepository;
}

export const getPpaQuotationDetail = async (
  deps: GetPpaQuotationDetailDeps,
  bundleId: number
): Promise<Result<PpaQuotationDetail, PpaQuotationError>> => {
  const result = await deps.ppaQuotationRepo.getBundleDetail(bundleId);
  if (result.isErr()) {
    return err(result.error);
  }

  if (result.value === null) {
    return err(createBundleNotFoundError(bundleId));
  }

  return ok(toDetail(result.value));
};
