#!/usr/bin/env tsx

/**
 * PPA Demo Data Seeder
 *
 * Applies the schema and loads a small, fixed data set: reference data,
 * three quotation bundles with projects and supply points, and contracts that
 * end in the current renewal month. Safe to re-run; existing rows are kept.
 *
 * Usage:
 *   DATABASE_URL=postgresql://... tsx scripts/seed-ppa.ts
 */

import { readFile } from 'node:fs/promises';

import { sql, type Kysely, type Transaction } from 'kysely';

import { addDays, toLocalIsoDate } from '../src/common/utils/dates.js';
import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { initDatabases, type PpaDatabase } from '../src/infra/database/client.js';
import { createLogger } from '../src/infra/logger/index.js';
import { computeRenewalWindow } from '../src/modules/contracts/index.js';

const SCHEMA_URL = new URL('../src/infra/database/schema.sql', import.meta.url);

/** Tables whose ids are seeded explicitly and whose sequences must catch up */
const SEEDED_TABLES = [
  'plans',
  'agencies',
  'customers',
  'ppa_bundles',
  'ppa_projects',
  'ppa_supply_points',
] as const;

const seedReferenceData = async (trx: Transaction<PpaDatabase>): Promise<void> => {
  await trx
    .insertInto('plans')
    .values([
      { id: 101, name: 'PPA Standard' },
      { id: 102, name: 'PPA Green' },
      { id: 103, name: 'PPA Flex' },
    ])
    .onConflict((oc) => oc.doNothing())
    .execute();

  await trx
    .insertInto('agencies')
    .values([
      { id: 23, agency_number: 'AG-023', name: 'North Agency' },
      { id: 24, agency_number: 'AG-024', name: 'South Agency' },
      { id: 25, agency_number: 'AG-025', name: 'West Agency' },
    ])
    .onConflict((oc) => oc.doNothing())
    .execute();

  await trx
    .insertInto('customers')
    .values([
      { id: 501, name: 'Alpha Foods', agency_id: 23 },
      { id: 502, name: 'Beta Metals', agency_id: 24 },
      { id: 503, name: 'Gamma Logistics', agency_id: null },
    ])
    .onConflict((oc) => oc.doNothing())
    .execute();
};

const seedBundles = async (trx: Transaction<PpaDatabase>): Promise<void> => {
  await trx
    .insertInto('ppa_bundles')
    .values([
      {
        id: 9001,
        customer_id: 501,
        agency_id: 23,
        plan_id: 101,
        voltage: 'HIGH',
        area: 'TOKYO',
        contract_start_date: '2026-04-01',
        quote_valid_days: 60,
        requested_at: '2025-07-01',
        request_due_date: '2025-07-15',
      },
      {
        id: 9002,
        customer_id: 502,
        agency_id: 24,
        plan_id: 102,
        voltage: 'EXTRA_HIGH',
        area: 'KANSAI',
        contract_start_date: '2026-04-01',
        quote_valid_days: 30,
        requested_at: '2025-06-10',
        request_due_date: '2025-06-30',
        quote_status: 'SUBMITTED',
        offer_status: 'OFFERED',
      },
      {
        id: 9003,
        customer_id: 503,
        agency_id: null,
        plan_id: 103,
        voltage: 'LOW',
        area: 'KYUSHU',
        contract_start_date: null,
        quote_valid_days: null,
        requested_at: null,
        request_due_date: null,
      },
    ])
    .onConflict((oc) => oc.doNothing())
    .execute();

  await trx
    .insertInto('ppa_projects')
    .values([
      { id: 12001, bundle_id: 9001, capacity_mw: 1.2, ppa_unit_price_yen_per_kwh: 14.5 },
      { id: 12002, bundle_id: 9002, capacity_mw: 0.8, ppa_unit_price_yen_per_kwh: null },
    ])
    .onConflict((oc) => oc.doNothing())
    .execute();

  const tokyoPoint = (id: number, projectId: number | null, contractKw: number) => ({
    id,
    bundle_id: 9001,
    project_id: projectId,
    name: `Alpha Foods site ${String(id % 100)}`,
    address: null,
    supply_point_number: `03-0000-0000-${String(id)}`,
    contract_kw: contractKw,
  });

  await trx
    .insertInto('ppa_supply_points')
    .values([
      tokyoPoint(900101, 12001, 500),
      tokyoPoint(900102, 12001, 440),
      tokyoPoint(900103, null, 600),
      tokyoPoint(900104, null, 450),
      tokyoPoint(900105, null, 400),
      tokyoPoint(900106, null, 430),
      {
        id: 900201,
        bundle_id: 9002,
        project_id: 12002,
        name: 'Beta Metals plant',
        address: 'Osaka',
        supply_point_number: '06-0000-0000-900201',
        contract_kw: 1200,
      },
    ])
    .onConflict((oc) => oc.doNothing())
    .execute();
};

/**
 * Contracts ending on the first, the 15th and the last day of the renewal
 * month containing `today`, plus one already under estimate.
 */
const seedContracts = async (trx: Transaction<PpaDatabase>, today: string): Promise<number> => {
  const window = computeRenewalWindow(today);
  const lastDay = addDays(window.end, -1) ?? window.start;
  const midMonth = `${window.start.slice(0, 8)}15`;

  const contract = (
    customerId: number,
    planId: number,
    supplyPointNumber: string,
    endDate: string,
    status: 'UNDER_CONTRACT' | 'RECONTRACT_ESTIMATE' = 'UNDER_CONTRACT'
  ) => ({
    customer_id: customerId,
    plan_id: planId,
    supply_point_number: supplyPointNumber,
    start_date: addDays(endDate, -364) ?? endDate,
    end_date: endDate,
    contract_power_kw: 500,
    status,
  });

  const result = await trx
    .insertInto('contracts')
    .values([
      contract(501, 101, 'SPN-0001', window.start),
      contract(502, 102, 'SPN-0002', midMonth),
      contract(501, 101, 'SPN-0003', lastDay),
      contract(503, 103, 'SPN-0004', midMonth, 'RECONTRACT_ESTIMATE'),
    ])
    .onConflict((oc) => oc.columns(['supply_point_number', 'end_date']).doNothing())
    .executeTakeFirst();

  return Number(result.numInsertedOrUpdatedRows ?? 0n);
};

const resetSequences = async (db: Kysely<PpaDatabase>): Promise<void> => {
  for (const table of SEEDED_TABLES) {
    await sql`
      SELECT setval(
        pg_get_serial_sequence(${table}, 'id'),
        (SELECT COALESCE(MAX(id), 1) FROM ${sql.table(table)})
      )
    `.execute(db);
  }
};

async function main(): Promise<void> {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({
    level: config.logger.level,
    name: 'seed-ppa',
    pretty: config.logger.pretty,
  });
  const { ppaDb } = initDatabases(config);

  try {
    const schema = await readFile(SCHEMA_URL, 'utf8');
    await sql.raw(schema).execute(ppaDb);
    logger.info('Schema applied');

    const today = toLocalIsoDate(new Date());
    const insertedContracts = await ppaDb.transaction().execute(async (trx) => {
      await seedReferenceData(trx);
      await seedBundles(trx);
      return seedContracts(trx, today);
    });
    await resetSequences(ppaDb);

    logger.info({ today, insertedContracts }, 'Seed data loaded');
  } finally {
    await ppaDb.destroy();
  }
}

await main().catch((error: unknown) => {
  console.error('Seeding failed:', error);
  process.exit(1);
});
