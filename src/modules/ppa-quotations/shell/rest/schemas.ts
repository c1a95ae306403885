/**
 * PPA Quotations REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import {
  ErrorResponseSchema,
  IdSchema,
  Int4Schema,
  IsoDateSchema,
  Nullable,
  OfferStatusSchema,
  QuoteStatusSchema,
} from '../../../../common/schemas/base.js';

export { ErrorResponseSchema };

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

const PageSizeSchema = Type.Integer({ minimum: 1, maximum: 200 });

/**
 * `rows`/`size`, `area`/`region` and `quote_status`/`pricing_status` are
 * aliases; the first of each pair wins when both are sent.
 */
export const ListPpaQuotationsQuerySchema = Type.Object({
  page: Type.Optional(IdSchema),
  rows: Type.Optional(PageSizeSchema),
  size: Type.Optional(PageSizeSchema),
  sort_by: Type.Optional(Type.String()),
  sort_order: Type.Optional(Type.String()),
  customer_id: Type.Optional(Int4Schema),
  agency_id: Type.Optional(Int4Schema),
  area: Type.Optional(Type.String()),
  region: Type.Optional(Type.String()),
  quote_status: Type.Optional(QuoteStatusSchema),
  pricing_status: Type.Optional(QuoteStatusSchema),
  offer_status: Type.Optional(OfferStatusSchema),
});

export type ListPpaQuotationsQuery = Static<typeof ListPpaQuotationsQuerySchema>;

export const BundleIdParamsSchema = Type.Object({
  bundleId: IdSchema,
});

export type BundleIdParams = Static<typeof BundleIdParamsSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

const listItemProperties = {
  id: Type.Integer(),
  tender_number: Type.String(),
  customer_name: Type.String(),
  plan_id: Type.Integer(),
  plan_name_en: Type.String(),
  plan_name_jp: Type.String(),
  sales_agent_id: Nullable(Type.Integer()),
  sales_agent_name: Nullable(Type.String()),
  region_id: Type.Integer(),
  region_name_en: Type.String(),
  region_name_jp: Type.String(),
  quote_request_date: Nullable(IsoDateSchema),
  last_date_for_quotation: Nullable(IsoDateSchema),
  quote_valid_until: Nullable(Type.String()),
  contract_start_date: Nullable(IsoDateSchema),
  num_of_spids: Type.Integer(),
  peak_demand: Nullable(Type.Number()),
  annual_usage: Nullable(Type.Number()),
  pricing_status_id: Type.Integer(),
  pricing_status_en: Type.String(),
  pricing_status_jp: Type.String(),
  offer_status_id: Type.Integer(),
  offer_status_en: Type.String(),
  offer_status_jp: Type.String(),
  last_updated: Nullable(Type.String()),
  has_quotation_file: Type.Boolean(),
  summary_number: Type.String(),
  project_count: Type.Integer(),
  contract_power_kw: Type.Number(),
  expiration_date: Nullable(IsoDateSchema),
};

export const PpaQuotationListItemSchema = Type.Object(listItemProperties);

export const PpaQuotationListResponseSchema = Type.Object({
  total_count: Type.Integer(),
  filtered_count: Type.Integer(),
  data: Type.Array(PpaQuotationListItemSchema),
});

export const PpaQuotationProjectSchema = Type.Object({
  project_id: Type.Integer(),
  capacity_mw: Type.Number(),
  capacity_kw: Type.Number(),
  num_of_spids: Type.Integer(),
  contract_power_kw: Type.Number(),
});

export const PpaQuotationDetailSchema = Type.Object({
  ...listItemProperties,
  projects: Type.Array(PpaQuotationProjectSchema),
  supply_points_count: Type.Integer(),
});
