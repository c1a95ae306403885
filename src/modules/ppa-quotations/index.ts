/**
 * PPA Quotations Module - Public API
 *
 * Bundle list with aggregates, bundle detail with per-project rollups and
 * the display mapping shared by both.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Repository
// ─────────────────────────────────────────────────────────────────────────────
export {
  makePpaQuotationRepo,
  type PpaQuotationRepoOptions,
} from './shell/repo/ppa-quotations-repo.js';
export type { PpaQuotationRepository } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────
export {
  listPpaQuotations,
  resolveSort,
  type ListPpaQuotationsDeps,
} from './core/usecases/list-ppa-quotations.js';
export {
  getPpaQuotationDetail,
  type GetPpaQuotationDetailDeps,
} from './core/usecases/get-ppa-quotation-detail.js';

// ─────────────────────────────────────────────────────────────────────────────
// REST
// ─────────────────────────────────────────────────────────────────────────────
export { makePpaQuotationRoutes, type MakePpaQuotationRoutesDeps } from './shell/rest/routes.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export type {
  BundleDetailRecord,
  BundleListFilter,
  BundleListPage,
  BundleListQuery,
  BundleSummaryRow,
  ListPpaQuotationsInput,
  PpaQuotationDetail,
  PpaQuotationListItem,
  PpaQuotationListResponse,
  ProjectRollupRow,
  SortKey,
  SortOrder,
} from './core/types.js';
export { SORT_KEYS } from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────
export type { PpaQuotationError, BundleNotFoundError } from './core/errors.js';
export { createBundleNotFoundError } from './core/errors.js';
