/**
 * Port interfaces for the PPA quotations module.
 */

import type { PpaQuotationError } from './errors.js';
import type { BundleDetailRecord, BundleListPage, BundleListQuery } from './types.js';
import type { Result } from 'neverthrow';

export interface PpaQuotationRepository {
  /**
   * One page of bundle summaries plus unfiltered and filtered bundle counts.
   *
   * Rows are ordered by the requested sort column, then bundle id descending.
   * Counts ignore pagination and are computed without joining children.
   */
  listBundles(query: BundleListQuery): Promise<Result<BundleListPage, PpaQuotationError>>;

  /**
   * Header aggregate and project rollups for one bundle, or null when the
   * bundle does not exist.
   */
  getBundleDetail(bundleId: number): Promise<Result<BundleDetailRecord | null, PpaQuotationError>>;
}
