/**
 * Persisted enum label sets.
 *
 * Each tuple mirrors a PostgreSQL enum type in `infra/database/schema.sql`.
 * Renaming a label needs a schema migration.
 */

export const CONTRACT_STATUSES = ['UNDER_CONTRACT', 'RECONTRACT_ESTIMATE', 'RECONTRACTED'] as const;
export type ContractStatus = (typeof CONTRACT_STATUSES)[number];

export const ANCILLARY_TYPES = [
  'STANDBY_POWER',
  'STANDBY_LINE',
  'PRIVATE_POWER_SUPPLY',
  'NON_FOSSIL_CERT',
  'RENEWABLE_LEVY_REDUCTION',
  'ENECLOUD_DISCOUNT',
] as const;
export type AncillaryType = (typeof ANCILLARY_TYPES)[number];

export const VOLTAGE_LEVELS = ['HIGH', 'EXTRA_HIGH', 'LOW'] as const;
export type VoltageLevel = (typeof VOLTAGE_LEVELS)[number];

export const QUOTE_STATUSES = ['DRAFT', 'SUBMITTED', 'PRICED', 'EXCEL_READY'] as const;
export type QuoteStatus = (typeof QUOTE_STATUSES)[number];

export const OFFER_STATUSES = ['NONE', 'OFFERED', 'WON', 'LOST'] as const;
export type OfferStatus = (typeof OFFER_STATUSES)[number];

export const QUOTE_EFFECTIVE_DAYS = [30, 60] as const;
export type QuoteEffectiveDays = (typeof QUOTE_EFFECTIVE_DAYS)[number];

const includes = <T extends string | number>(set: readonly T[], value: unknown): value is T =>
  set.some((member) => member === value);

export const isContractStatus = (value: unknown): value is ContractStatus =>
  includes(CONTRACT_STATUSES, value);

export const isQuoteStatus = (value: unknown): value is QuoteStatus =>
  includes(QUOTE_STATUSES, value);

export const isOfferStatus = (value: unknown): value is OfferStatus =>
  includes(OFFER_STATUSES, value);

export const isQuoteEffectiveDays = (value: unknown): value is QuoteEffectiveDays =>
  includes(QUOTE_EFFECTIVE_DAYS, value);
