/**
 * Core types for re-contract estimates.
 */

import type { QuoteEffectiveDays } from '../../../common/types/enums.js';

// ─────────────────────────────────────────────────────────────────────────────
// Limits
// ─────────────────────────────────────────────────────────────────────────────

export const MIN_SUPPLY_POINTS = 1;
export const MAX_SUPPLY_POINTS = 20;
export const MAX_SUPPLY_POINT_NUMBER_LENGTH = 64;
/** User-supplied capacity scenarios, not counting the implicit zero scenario */
export const MAX_PLANTS = 3;
export const MAX_REMARKS_LENGTH = 500;
/** desired_quote_date must fall within [today, today + this many days] */
export const DESIRED_QUOTE_WINDOW_DAYS = 31;

// ─────────────────────────────────────────────────────────────────────────────
// Input
// ─────────────────────────────────────────────────────────────────────────────

export interface RecontractPlantInput {
  capacityMw: number;
  ppaUnitPriceYenPerKwh: number | null;
}

/**
 * Request as received, before domain validation.
 */
export interface CreateRecontractEstimateInput {
  planId: number;
  customerId: number;
  desiredQuoteDate: string;
  quoteEffectiveDays: number;
  remarks: string | null;
  supplyPointNumbers: string[];
  plants: RecontractPlantInput[];
}

/**
 * Validated estimate ready to persist. `plants` starts with the implicit
 * zero-capacity scenario.
 */
export interface NewRecontractEstimate {
  planId: number;
  customerId: number;
  desiredQuoteDate: string;
  quoteEffectiveDays: QuoteEffectiveDays;
  remarks: string | null;
  supplyPointNumbers: string[];
  plants: RecontractPlantInput[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Persisted
// ─────────────────────────────────────────────────────────────────────────────

export interface RecontractSupplyPoint {
  id: number;
  supplyPointNumber: string;
}

export interface RecontractPlant {
  id: number;
  capacityMw: number;
  ppaUnitPriceYenPerKwh: number | null;
}

export interface RecontractEstimate {
  id: number;
  planId: number;
  customerId: number;
  desiredQuoteDate: string;
  quoteEffectiveDays: number;
  remarks: string | null;
  supplyPoints: RecontractSupplyPoint[];
  plants: RecontractPlant[];
}

export interface CreatedRecontractEstimate {
  estimate: RecontractEstimate;
  /** Contracts moved from UNDER_CONTRACT to RECONTRACT_ESTIMATE */
  transitionedContracts: number;
}
