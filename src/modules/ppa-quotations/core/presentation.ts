/**
 * Presentation mapping for PPA quotations.
 *
 * Pure functions that turn raw bundle rows into the dashboard display
 * contract. None of them throw: unknown codes resolve to fixed fallbacks.
 */

import { Decimal } from 'decimal.js';

import { addDays, formatLocalMinute } from '../../../common/utils/dates.js';

import type {
  BundleDetailRecord,
  BundleSummaryRow,
  PpaQuotationDetail,
  PpaQuotationListItem,
  PpaQuotationProject,
  ProjectRollupRow,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Display triplets
// ─────────────────────────────────────────────────────────────────────────────

export interface Region {
  id: number;
  nameEn: string;
  nameJp: string;
}

export interface StatusLabel {
  id: number;
  labelEn: string;
  labelJp: string;
}

export const UNKNOWN_REGION: Region = { id: 0, nameEn: 'Unknown', nameJp: '不明' };

export const DEFAULT_STATUS_LABEL: StatusLabel = { id: 1, labelEn: 'pending', labelJp: '保留中' };

const HOKKAIDO: Region = { id: 1, nameEn: 'Hokkaido', nameJp: '北海道' };
const TOHOKU: Region = { id: 2, nameEn: 'Tohoku', nameJp: '東北' };
const TOKYO: Region = { id: 3, nameEn: 'Tokyo', nameJp: '東京' };
const CHUBU: Region = { id: 4, nameEn: 'Chubu', nameJp: '中部' };
const HOKURIKU: Region = { id: 5, nameEn: 'Hokuriku', nameJp: '北陸' };
const KANSAI: Region = { id: 6, nameEn: 'Kansai', nameJp: '関西' };
const CHUGOKU: Region = { id: 7, nameEn: 'Chugoku', nameJp: '中国' };
const SHIKOKU: Region = { id: 8, nameEn: 'Shikoku', nameJp: '四国' };
const KYUSHU: Region = { id: 9, nameEn: 'Kyushu', nameJp: '九州' };
const OKINAWA: Region = { id: 10, nameEn: 'Okinawa', nameJp: '沖縄' };

/** Upper-cased area code → grid region */
const REGIONS_BY_AREA: ReadonlyMap<string, Region> = new Map([
  ['HOKKAIDO', HOKKAIDO],
  ['TOHOKU', TOHOKU],
  ['TOKYO', TOKYO],
  ['KANTO', TOKYO],
  ['CHUBU', CHUBU],
  ['HOKURIKU', HOKURIKU],
  ['KANSAI', KANSAI],
  ['KINKI', KANSAI],
  ['CHUGOKU', CHUGOKU],
  ['SHIKOKU', SHIKOKU],
  ['KYUSHU', KYUSHU],
  ['OKINAWA', OKINAWA],
]);

const PRICING_STATUS_LABELS: ReadonlyMap<string, StatusLabel> = new Map([
  ['DRAFT', DEFAULT_STATUS_LABEL],
  ['SUBMITTED', { id: 2, labelEn: 'preliminary', labelJp: '暫定' }],
  ['PRICED', { id: 3, labelEn: 'finalized', labelJp: '確定' }],
  ['EXCEL_READY', { id: 4, labelEn: 'excel_ready', labelJp: 'Excel準備完了' }],
  // legacy labels
  ['PRELIMINARY', { id: 2, labelEn: 'preliminary', labelJp: '暫定' }],
  ['FINAL', { id: 3, labelEn: 'finalized', labelJp: '確定' }],
]);

const OFFER_STATUS_LABELS: ReadonlyMap<string, StatusLabel> = new Map([
  ['NONE', DEFAULT_STATUS_LABEL],
  ['OFFERED', { id: 2, labelEn: 'sent', labelJp: '送付済み' }],
  ['WON', { id: 3, labelEn: 'accepted', labelJp: '受領' }],
  ['LOST', { id: 4, labelEn: 'rejected', labelJp: '拒否' }],
  // legacy labels
  ['SENT', { id: 2, labelEn: 'sent', labelJp: '送付済み' }],
  ['ACCEPTED', { id: 3, labelEn: 'accepted', labelJp: '受領' }],
  ['REJECTED', { id: 4, labelEn: 'rejected', labelJp: '拒否' }],
]);

/**
 * Resolves an area code (case-insensitive) to its grid region.
 */
export const mapRegion = (area: string | null | undefined): Region => {
  if (area === null || area === undefined) {
    return UNKNOWN_REGION;
  }
  return REGIONS_BY_AREA.get(area.trim().toUpperCase()) ?? UNKNOWN_REGION;
};

export const mapPricingStatus = (status: string | null | undefined): StatusLabel =>
  (status != null ? PRICING_STATUS_LABELS.get(status) : undefined) ?? DEFAULT_STATUS_LABEL;

export const mapOfferStatus = (status: string | null | undefined): StatusLabel =>
  (status != null ? OFFER_STATUS_LABELS.get(status) : undefined) ?? DEFAULT_STATUS_LABEL;

// ─────────────────────────────────────────────────────────────────────────────
// Dates and identifiers
// ─────────────────────────────────────────────────────────────────────────────

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

export interface Validity {
  expirationDate: string | null;
  display: string | null;
}

const NO_VALIDITY: Validity = { expirationDate: null, display: null };

/**
 * Expiration = request date + validity days, displayed as "YYYY-MM-DD (N日)".
 * Both fields are null unless both inputs are present.
 */
export const computeValidity = (
  requestDate: string | null | undefined,
  days: number | null | undefined
): Validity => {
  if (requestDate == null || requestDate === '' || days == null || days <= 0) {
    return NO_VALIDITY;
  }
  const expirationDate = addDays(requestDate, days);
  if (expirationDate === null) {
    return NO_VALIDITY;
  }
  return { expirationDate, display: `${expirationDate} (${String(days)}日)` };
};

/**
 * "PPA" followed by the bundle id padded to 8 digits.
 */
export const formatSummaryNumber = (bundleId: number): string => `PPA${pad(bundleId, 8)}`;

/**
 * Formats a stored timestamp as "YYYY-MM-DD HH:MM" in server-local wall time,
 * which is how TIMESTAMP WITHOUT TIME ZONE values are materialized.
 */
export const formatLastUpdated = (timestamp: Date | null | undefined): string | null => {
  if (timestamp == null || Number.isNaN(timestamp.getTime())) {
    return null;
  }
  return formatLocalMinute(timestamp);
};

/**
 * MW → kW without binary floating point drift.
 */
export const megawattsToKilowatts = (capacityMw: number): number =>
  new Decimal(capacityMw).times(1000).toNumber();

// ─────────────────────────────────────────────────────────────────────────────
// Row mappers
// ─────────────────────────────────────────────────────────────────────────────

export const toListItem = (row: BundleSummaryRow): PpaQuotationListItem => {
  const region = mapRegion(row.area);
  const pricing = mapPricingStatus(row.quoteStatus);
  const offer = mapOfferStatus(row.offerStatus);
  const validity = computeValidity(row.requestedAt, row.quoteValidDays);
  const summaryNumber = formatSummaryNumber(row.bundleId);

  return {
    id: row.bundleId,
    tender_number: summaryNumber,
    customer_name: row.customerName,
    plan_id: row.planId,
    plan_name_en: row.planName,
    plan_name_jp: row.planName,
    sales_agent_id: row.agencyId,
    sales_agent_name: row.agencyName,
    region_id: region.id,
    region_name_en: region.nameEn,
    region_name_jp: region.nameJp,
    quote_request_date: row.requestedAt,
    last_date_for_quotation: row.requestDueDate,
    quote_valid_until: validity.display,
    contract_start_date: row.contractStartDate,
    num_of_spids: row.supplyPointCount,
    peak_demand: null,
    annual_usage: null,
    pricing_status_id: pricing.id,
    pricing_status_en: pricing.labelEn,
    pricing_status_jp: pricing.labelJp,
    offer_status_id: offer.id,
    offer_status_en: offer.labelEn,
    offer_status_jp: offer.labelJp,
    last_updated: formatLastUpdated(row.updatedAt),
    has_quotation_file: false,
    summary_number: summaryNumber,
    project_count: row.projectCount,
    contract_power_kw: row.contractPowerKw,
    expiration_date: validity.expirationDate,
  };
};

export const toProject = (row: ProjectRollupRow): PpaQuotationProject => ({
  project_id: row.projectId,
  capacity_mw: row.capacityMw,
  capacity_kw: megawattsToKilowatts(row.capacityMw),
  num_of_spids: row.supplyPointCount,
  contract_power_kw: row.contractPowerKw,
});

export const toDetail = (record: BundleDetailRecord): PpaQuotationDetail => ({
  ...toListItem(record.header),
  project_count: record.projects.length,
  projects: record.projects.map(toProject),
  supply_points_count: record.header.supplyPointCount,
});
