/**
 * PPA Quotations Module - Domain Errors
 */

import type { InfraError } from '../../../common/types/errors.js';

export { createDatabaseError } from '../../../common/types/errors.js';

export interface BundleNotFoundError {
  readonly type: 'BundleNotFoundError';
  readonly message: string;
  readonly bundleId: number;
}

export type PpaQuotationError = InfraError | BundleNotFoundError;

export const createBundleNotFoundError = (bundleId: number): BundleNotFoundError => ({
  type: 'BundleNotFoundError',
  message: 'Bundle not found',
  bundleId,
});

/**
 * HTTP status per error type.
 */
export const PPA_QUOTATION_ERROR_HTTP_STATUS: Record<PpaQuotationError['type'], number> = {
  DatabaseError: 500,
  TimeoutError: 504,
  BundleNotFoundError: 404,
};

export const getHttpStatusForError = (error: PpaQuotationError): number =>
  PPA_QUOTATION_ERROR_HTTP_STATUS[error.type];
