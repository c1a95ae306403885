/**
 * Domain error types for the contracts module.
 */

import type { InfraError } from '../../../common/types/errors.js';

export { createDatabaseError } from '../../../common/types/errors.js';

/**
 * Currently only infrastructure errors (database failures).
 */
export type ContractsError = InfraError;

export const getHttpStatusForError = (error: ContractsError): number =>
  error.type === 'TimeoutError' ? 504 : 500;
