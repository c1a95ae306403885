/**
 * Contracts Repository Implementation
 */

import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type ContractsError } from '../../core/errors.js';

import type { PpaDbClient } from '../../../../infra/database/client.js';
import type { ContractsRepository } from '../../core/ports.js';
import type { RenewalCase, RenewalWindow } from '../../core/types.js';
import type { Logger } from 'pino';

export interface ContractsRepoOptions {
  db: PpaDbClient;
  logger: Logger;
}

export const selectRenewalCases = (db: PpaDbClient, window: RenewalWindow) =>
  db
    .selectFrom('contracts as ct')
    .innerJoin('customers as c', 'c.id', 'ct.customer_id')
    .innerJoin('plans as pl', 'pl.id', 'ct.plan_id')
    .select([
      'ct.id as contract_id',
      'c.name as customer_name',
      'ct.supply_point_number',
      'pl.name as plan_name',
      'ct.end_date',
    ])
    .where('ct.status', '=', 'UNDER_CONTRACT')
    .where('ct.end_date', '>=', window.start)
    .where('ct.end_date', '<', window.end)
    .orderBy('ct.end_date', 'asc')
    .orderBy('ct.id', 'asc');

class KyselyContractsRepo implements ContractsRepository {
  private readonly db: PpaDbClient;
  private readonly log: Logger;

  constructor(options: ContractsRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'ContractsRepo' });
  }

  async listRenewalCases(window: RenewalWindow): Promise<Result<RenewalCase[], ContractsError>> {
    try {
      const rows = await selectRenewalCases(this.db, window).execute();

      return ok(
        rows.map((row) => ({
          contractId: row.contract_id,
          customerName: row.customer_name,
          supplyPointNumber: row.supply_point_number,
          planName: row.plan_name,
          endDate: row.end_date,
        }))
      );
    } catch (error) {
      this.log.error({ err: error, window }, 'Failed to list renewal cases');
      return err(createDatabaseError('Failed to list renewal cases', error));
    }
  }
}

export const makeContractsRepo = (options: ContractsRepoOptions): ContractsRepository => {
  return new KyselyContractsRepo(options);
};
