/**
 * Core types for the PPA quotations module.
 *
 * Raw rows (`BundleSummaryRow`, `ProjectRollupRow`) come from the repository;
 * the snake_case view types are the display contract consumed by the dashboard.
 */

import type { OfferStatus, QuoteStatus } from '../../../common/types/enums.js';

// ─────────────────────────────────────────────────────────────────────────────
// Sorting
// ─────────────────────────────────────────────────────────────────────────────

export const SORT_KEYS = [
  'updated_at',
  'id',
  'contract_start_date',
  'customer_name',
  'plan_name',
  'region',
  'quote_request_date',
  'last_date_for_quotation',
] as const;

export type SortKey = (typeof SORT_KEYS)[number];

export type SortOrder = 'asc' | 'desc';

export const DEFAULT_SORT_KEY: SortKey = 'updated_at';
export const DEFAULT_SORT_ORDER: SortOrder = 'desc';

export interface BundleSort {
  key: SortKey;
  order: SortOrder;
}

// ─────────────────────────────────────────────────────────────────────────────
// Query
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Equality filters on bundle-owned columns. Absent fields do not filter.
 */
export interface BundleListFilter {
  customerId?: number | undefined;
  agencyId?: number | undefined;
  area?: string | undefined;
  quoteStatus?: QuoteStatus | undefined;
  offerStatus?: OfferStatus | undefined;
}

export interface BundleListQuery {
  filter: BundleListFilter;
  sort: BundleSort;
  limit: number;
  offset: number;
}

/**
 * Raw use case input, before sort resolution and pagination clamping.
 */
export interface ListPpaQuotationsInput {
  page?: number | undefined;
  rows?: number | undefined;
  sortBy?: string | undefined;
  sortOrder?: string | undefined;
  filter?: BundleListFilter | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Repository rows
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One bundle with its joined reference names and child aggregates.
 * Dates are 'YYYY-MM-DD' strings.
 */
export interface BundleSummaryRow {
  bundleId: number;
  planId: number;
  planName: string;
  customerName: string;
  agencyId: number | null;
  agencyName: string | null;
  area: string | null;
  contractStartDate: string | null;
  requestedAt: string | null;
  requestDueDate: string | null;
  quoteValidDays: number | null;
  quoteStatus: string | null;
  offerStatus: string | null;
  updatedAt: Date | null;
  supplyPointCount: number;
  contractPowerKw: number;
  projectCount: number;
}

export interface BundleListPage {
  totalCount: number;
  filteredCount: number;
  rows: BundleSummaryRow[];
}

/**
 * A project with totals over the supply points linked to it.
 */
export interface ProjectRollupRow {
  projectId: number;
  capacityMw: number;
  supplyPointCount: number;
  contractPowerKw: number;
}

export interface BundleDetailRecord {
  header: BundleSummaryRow;
  projects: ProjectRollupRow[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Display contract
// ─────────────────────────────────────────────────────────────────────────────

export interface PpaQuotationListItem {
  id: number;
  tender_number: string;
  customer_name: string;
  plan_id: number;
  plan_name_en: string;
  plan_name_jp: string;
  sales_agent_id: number | null;
  sales_agent_name: string | null;
  region_id: number;
  region_name_en: string;
  region_name_jp: string;
  quote_request_date: string | null;
  last_date_for_quotation: string | null;
  quote_valid_until: string | null;
  contract_start_date: string | null;
  num_of_spids: number;
  peak_demand: number | null;
  annual_usage: number | null;
  pricing_status_id: number;
  pricing_status_en: string;
  pricing_status_jp: string;
  offer_status_id: number;
  offer_status_en: string;
  offer_status_jp: string;
  last_updated: string | null;
  has_quotation_file: boolean;
  summary_number: string;
  project_count: number;
  contract_power_kw: number;
  expiration_date: string | null;
}

export interface PpaQuotationListResponse {
  total_count: number;
  filtered_count: number;
  data: PpaQuotationListItem[];
}

export interface PpaQuotationProject {
  project_id: number;
  capacity_mw: number;
  capacity_kw: number;
  num_of_spids: number;
  contract_power_kw: number;
}

export interface PpaQuotationDetail extends PpaQuotationListItem {
  projects: PpaQuotationProject[];
  supply_points_count: number;
}
