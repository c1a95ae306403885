/**
 * Recontracts Module - Domain Errors
 *
 * Input problems found locally, unresolved references and constraint
 * violations at commit all surface as ValidationError (400) and differ only
 * in their message.
 */

import {
  createValidationError,
  type InfraError,
  type ValidationError,
} from '../../../common/types/errors.js';

export { createDatabaseError, createValidationError } from '../../../common/types/errors.js';

export interface EstimateNotFoundError {
  readonly type: 'EstimateNotFoundError';
  readonly message: string;
  readonly estimateId: number;
}

export type RecontractError = InfraError | ValidationError | EstimateNotFoundError;

export const createEstimateNotFoundError = (estimateId: number): EstimateNotFoundError => ({
  type: 'EstimateNotFoundError',
  message: 'Estimate not found',
  estimateId,
});

export const createInvalidReferenceError = (
  field: 'plan_id' | 'customer_id',
  id: number
): ValidationError => createValidationError(`Invalid ${field}: ${String(id)}`, field, id);

export const createConstraintViolationError = (detail: string): ValidationError =>
  createValidationError(`Database constraint error: ${detail}`);

export const RECONTRACT_ERROR_HTTP_STATUS: Record<RecontractError['type'], number> = {
  DatabaseError: 500,
  TimeoutError: 504,
  ValidationError: 400,
  EstimateNotFoundError: 404,
};

export const getHttpStatusForError = (error: RecontractError): number =>
  RECONTRACT_ERROR_HTTP_STATUS[error.type];
