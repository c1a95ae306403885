/**
 * PPA Quotations Repository Implementation
 *
 * Kysely queries over ppa_bundles and their projects and supply points.
 * Child aggregates are pre-grouped in derived tables, so joining projects
 * never multiplies supply point sums.
 */

import { sql } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type PpaQuotationError } from '../../core/errors.js';

import type { PpaQuotationRepository } from '../../core/ports.js';
import type {
  BundleDetailRecord,
  BundleListFilter,
  BundleListPage,
  BundleListQuery,
  BundleSummaryRow,
  ProjectRollupRow,
  SortKey,
} from '../../core/types.js';
import type { PpaDbClient } from '../../../../infra/database/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

type Count = string | number | bigint;

interface BundleSummaryQueryRow {
  bundle_id: number;
  plan_id: number;
  plan_name: string;
  customer_name: string;
  agency_id: number | null;
  agency_name: string | null;
  area: string;
  contract_start_date: string | null;
  requested_at: string | null;
  request_due_date: string | null;
  quote_valid_days: number | null;
  quote_status: string;
  offer_status: string;
  updated_at: Date;
  sp_count: Count | null;
  sum_kw: number | null;
  project_count: Count | null;
}

interface ProjectRollupQueryRow {
  project_id: number;
  capacity_mw: number;
  sp_count: Count;
  sum_kw: number | null;
}

export interface PpaQuotationRepoOptions {
  db: PpaDbClient;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Query Builders
// ─────────────────────────────────────────────────────────────────────────────

/** Whitelisted sort columns */
export const SORT_COLUMNS = {
  updated_at: 'b.updated_at',
  id: 'b.id',
  contract_start_date: 'b.contract_start_date',
  customer_name: 'c.name',
  plan_name: 'pl.name',
  region: 'b.area',
  quote_request_date: 'b.requested_at',
  last_date_for_quotation: 'b.request_due_date',
} as const satisfies Record<SortKey, string>;

/**
 * Bundles matching the filter, without joins. Shared by the page query and
 * the filtered count.
 */
export const selectFilteredBundles = (db: PpaDbClient, filter: BundleListFilter) => {
  let query = db.selectFrom('ppa_bundles as b');

  if (filter.customerId !== undefined) {
    query = query.where('b.customer_id', '=', filter.customerId);
  }
  if (filter.agencyId !== undefined) {
    query = query.where('b.agency_id', '=', filter.agencyId);
  }
  if (filter.area !== undefined && filter.area !== '') {
    query = query.where('b.area', '=', filter.area);
  }
  if (filter.quoteStatus !== undefined) {
    query = query.where('b.quote_status', '=', filter.quoteStatus);
  }
  if (filter.offerStatus !== undefined) {
    query = query.where('b.offer_status', '=', filter.offerStatus);
  }

  return query;
};

/**
 * One row per bundle with plan, customer and agency names and child aggregates.
 */
export const selectBundleSummaries = (db: PpaDbClient, filter: BundleListFilter) => {
  const supplyPointTotals = db
    .selectFrom('ppa_supply_points')
    .select((eb) => [
      'bundle_id',
      eb.fn.count<Count>('id').as('sp_count'),
      sql<number>`coalesce(sum(contract_kw), 0)`.as('sum_kw'),
    ])
    .groupBy('bundle_id')
    .as('spt');

  const projectTotals = db
    .selectFrom('ppa_projects')
    .select((eb) => ['bundle_id', eb.fn.count<Count>('id').as('project_count')])
    .groupBy('bundle_id')
    .as('pjt');

  return selectFilteredBundles(db, filter)
    .innerJoin('plans as pl', 'pl.id', 'b.plan_id')
    .innerJoin('customers as c', 'c.id', 'b.customer_id')
    .leftJoin('agencies as ag', 'ag.id', 'b.agency_id')
    .leftJoin(supplyPointTotals, 'spt.bundle_id', 'b.id')
    .leftJoin(projectTotals, 'pjt.bundle_id', 'b.id')
    .select([
      'b.id as bundle_id',
      'pl.id as plan_id',
      'pl.name as plan_name',
      'c.name as customer_name',
      'ag.id as agency_id',
      'ag.name as agency_name',
      'b.area',
      'b.contract_start_date',
      'b.requested_at',
      'b.request_due_date',
      'b.quote_valid_days',
      'b.quote_status',
      'b.offer_status',
      'b.updated_at',
      'spt.sp_count',
      'spt.sum_kw',
      'pjt.project_count',
    ]);
};

/**
 * Projects of one bundle, each with totals over its linked supply points.
 */
export const selectProjectRollups = (db: PpaDbClient, bundleId: number) =>
  db
    .selectFrom('ppa_projects as p')
    .leftJoin('ppa_supply_points as sp', (join) =>
      join.onRef('sp.project_id', '=', 'p.id').onRef('sp.bundle_id', '=', 'p.bundle_id')
    )
    .select((eb) => [
      'p.id as project_id',
      'p.capacity_mw',
      eb.fn.count<Count>('sp.id').as('sp_count'),
      sql<number>`coalesce(sum(sp.contract_kw), 0)`.as('sum_kw'),
    ])
    .where('p.bundle_id', '=', bundleId)
    .groupBy(['p.id', 'p.capacity_mw'])
    .orderBy('p.id', 'asc');

// ─────────────────────────────────────────────────────────────────────────────
// Row Mappers
// ─────────────────────────────────────────────────────────────────────────────

const toCount = (value: Count | null): number => (value === null ? 0 : Number(value));

const toSummaryRow = (row: BundleSummaryQueryRow): BundleSummaryRow => ({
  bundleId: row.bundle_id,
  planId: row.plan_id,
  planName: row.plan_name,
  customerName: row.customer_name,
  agencyId: row.agency_id,
  agencyName: row.agency_name,
  area: row.area,
  contractStartDate: row.contract_start_date,
  requestedAt: row.requested_at,
  requestDueDate: row.request_due_date,
  quoteValidDays: row.quote_valid_days,
  quoteStatus: row.quote_status,
  offerStatus: row.offer_status,
  updatedAt: row.updated_at,
  supplyPointCount: toCount(row.sp_count),
  contractPowerKw: row.sum_kw ?? 0,
  projectCount: toCount(row.project_count),
});

const toProjectRollupRow = (row: ProjectRollupQueryRow): ProjectRollupRow => ({
  projectId: row.project_id,
  capacityMw: row.capacity_mw,
  supplyPointCount: toCount(row.sp_count),
  contractPowerKw: row.sum_kw ?? 0,
});

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyPpaQuotationRepo implements PpaQuotationRepository {
  private readonly db: PpaDbClient;
  private readonly log: Logger;

  constructor(options: PpaQuotationRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'PpaQuotationRepo' });
  }

  async listBundles(query: BundleListQuery): Promise<Result<BundleListPage, PpaQuotationError>> {
    try {
      // All three statements share one pooled connection
      const page = await this.db.connection().execute(async (conn) => {
        const rows = await selectBundleSummaries(conn, query.filter)
          .orderBy(SORT_COLUMNS[query.sort.key], query.sort.order)
          .orderBy('b.id', 'desc')
          .limit(query.limit)
          .offset(query.offset)
          .execute();

        const total = await conn
          .selectFrom('ppa_bundles')
          .select((eb) => eb.fn.countAll<Count>().as('count'))
          .executeTakeFirstOrThrow();

        const filtered = await selectFilteredBundles(conn, query.filter)
          .select((eb) => eb.fn.countAll<Count>().as('count'))
          .executeTakeFirstOrThrow();

        return {
          totalCount: toCount(total.count),
          filteredCount: toCount(filtered.count),
          rows: rows.map(toSummaryRow),
        };
      });

      return ok(page);
    } catch (error) {
      this.log.error({ err: error, query }, 'Failed to list PPA bundles');
      return err(createDatabaseError('Failed to list PPA bundles', error));
    }
  }

  async getBundleDetail(
    bundleId: number
  ): Promise<Result<BundleDetailRecord | null, PpaQuotationError>> {
    try {
      const header = await selectBundleSummaries(this.db, {})
        .where('b.id', '=', bundleId)
        .executeTakeFirst();

      if (header === undefined) {
        return ok(null);
      }

      const projects = await selectProjectRollups(this.db, bundleId).execute();

      return ok({
        header: toSummaryRow(header),
        projects: projects.map(toProjectRollupRow),
      });
    } catch (error) {
      this.log.error({ err: error, bundleId }, 'Failed to load PPA bundle detail');
      return err(createDatabaseError(`Failed to load PPA bundle ${String(bundleId)}`, error));
    }
  }
}

/**
 * Factory function to create the PPA quotations repository.
 */
export const makePpaQuotationRepo = (options: PpaQuotationRepoOptions): PpaQuotationRepository => {
  return new KyselyPpaQuotationRepo(options);
};
