/**
 * Use case: List PPA quotation bundles with aggregates, filters and pagination.
 */

import { normalizePagination } from '../../../../common/constants/pagination.js';
import { toListItem } from '../presentation.js';
import {
  DEFAULT_SORT_KEY,
  DEFAULT_SORT_ORDER,
  SORT_KEYS,
  type BundleSort,
  type ListPpaQuotationsInput,
  type PpaQuotationListResponse,
  type SortKey,
} from '../types.js';

import type { PpaQuotationError } from '../errors.js';
import type { PpaQuotationRepository } from '../ports.js';
import type { Result } from 'neverthrow';

export interface ListPpaQuotationsDeps {
  ppaQuotationRepo: PpaQuotationRepository;
}

const isSortKey = (value: string): value is SortKey => SORT_KEYS.some((key) => key === value);

/**
 * Unknown sort keys fall back to updated_at; anything other than "asc" sorts
 * descending.
 */
export const resolveSort = (sortBy?: string, sortOrder?: string): BundleSort => ({
  key: sortBy !== undefined && isSortKey(sortBy) ? sortBy : DEFAULT_SORT_KEY,
  order: sortOrder?.toLowerCase() === 'asc' ? 'asc' : DEFAULT_SORT_ORDER,
});

export const listPpaQuotations = async (
  deps: ListPpaQuotationsDeps,
  input: ListPpaQuotationsInput
): Promise<Result<PpaQuotationListResponse, PpaQuotationError>> => {
  const { limit, offset } = normalizePagination({ page: input.page, size: input.rows });
  const sort = resolveSort(input.sortBy, input.sortOrder);

  const result = await deps.ppaQuotationRepo.listBundles({
    filter: input.filter ?? {},
    sort,
    limit,
    offset,
  });

  return result.map((page) => ({
    total_count: page.totalCount,
    filtered_count: page.filteredCount,
    data: page.rows.map(toListItem),
  }));
};
