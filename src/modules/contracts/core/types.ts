/**
 * Core types for the contracts module.
 */

/** Days added to the first of the current month to land in the renewal month */
export const RENEWAL_LOOKAHEAD_DAYS = 155;

/**
 * Half-open date range [start, end), both 'YYYY-MM-DD'.
 */
export interface RenewalWindow {
  start: string;
  end: string;
}

export interface RenewalCase {
  contractId: number;
  customerName: string;
  supplyPointNumber: string;
  planName: string;
  endDate: string;
}
