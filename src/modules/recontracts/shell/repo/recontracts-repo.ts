/**
 * Recontracts Repository Implementation
 *
 * Kysely-based persistence for recontract_estimates and their children,
 * including the contract status transition that accompanies a new estimate.
 */

import { ok, err, type Result } from 'neverthrow';

import { asIntegrityViolation } from '../../../../infra/database/pg-errors.js';
import {
  createConstraintViolationError,
  createDatabaseError,
  createInvalidReferenceError,
  type RecontractError,
} from '../../core/errors.js';

import type { ValidationError } from '../../../../common/types/errors.js';
import type { PpaDbClient } from '../../../../infra/database/client.js';
import type { RecontractRepository } from '../../core/ports.js';
import type {
  CreatedRecontractEstimate,
  NewRecontractEstimate,
  RecontractEstimate,
} from '../../core/types.js';
import type { Logger } from 'pino';

export interface RecontractRepoOptions {
  db: PpaDbClient;
  logger: Logger;
}

/**
 * Thrown inside the transaction callback to roll back with a domain error.
 */
class EstimateRejected extends Error {
  readonly reason: ValidationError;

  constructor(reason: ValidationError) {
    super(reason.message);
    this.name = 'EstimateRejected';
    this.reason = reason;
  }
}

/**
 * Loads an estimate with its supply points and plants, children by id.
 */
export const loadEstimate = async (
  db: PpaDbClient,
  estimateId: number
): Promise<RecontractEstimate | null> => {
  const header = await db
    .selectFrom('recontract_estimates')
    .select([
      'id',
      'plan_id',
      'customer_id',
      'desired_quote_date',
      'quote_effective_days',
      'remarks',
    ])
    .where('id', '=', estimateId)
    .executeTakeFirst();

  if (header === undefined) {
    return null;
  }

  const supplyPoints = await db
    .selectFrom('recontract_supply_points')
    .select(['id', 'supply_point_number'])
    .where('estimate_id', '=', estimateId)
    .orderBy('id', 'asc')
    .execute();

  const plants = await db
    .selectFrom('recontract_plants')
    .select(['id', 'capacity_mw', 'ppa_unit_price_yen_per_kwh'])
    .where('estimate_id', '=', estimateId)
    .orderBy('id', 'asc')
    .execute();

  return {
    id: header.id,
    planId: header.plan_id,
    customerId: header.customer_id,
    desiredQuoteDate: header.desired_quote_date,
    quoteEffectiveDays: header.quote_effective_days,
    remarks: header.remarks,
    supplyPoints: supplyPoints.map((sp) => ({
      id: sp.id,
      supplyPointNumber: sp.supply_point_number,
    })),
    plants: plants.map((plant) => ({
      id: plant.id,
      capacityMw: plant.capacity_mw,
      ppaUnitPriceYenPerKwh: plant.ppa_unit_price_yen_per_kwh,
    })),
  };
};

class KyselyRecontractRepo implements RecontractRepository {
  private readonly db: PpaDbClient;
  private readonly log: Logger;

  constructor(options: RecontractRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'RecontractRepo' });
  }

  async create(
    estimate: NewRecontractEstimate
  ): Promise<Result<CreatedRecontractEstimate, RecontractError>> {
    let committed: { estimateId: number; transitionedContracts: number };

    try {
      committed = await this.db.transaction().execute(async (trx) => {
        const plan = await trx
          .selectFrom('plans')
          .select('id')
          .where('id', '=', estimate.planId)
          .executeTakeFirst();
        if (plan === undefined) {
          throw new EstimateRejected(createInvalidReferenceError('plan_id', estimate.planId));
        }

        const customer = await trx
          .selectFrom('customers')
          .select('id')
          .where('id', '=', estimate.customerId)
          .executeTakeFirst();
        if (customer === undefined) {
          throw new EstimateRejected(
            createInvalidReferenceError('customer_id', estimate.customerId)
          );
        }

        const header = await trx
          .insertInto('recontract_estimates')
          .values({
            plan_id: estimate.planId,
            customer_id: estimate.customerId,
            desired_quote_date: estimate.desiredQuoteDate,
            quote_effective_days: estimate.quoteEffectiveDays,
            remarks: estimate.remarks,
          })
          .returning('id')
          .executeTakeFirstOrThrow();

        await trx
          .insertInto('recontract_supply_points')
          .values(
            estimate.supplyPointNumbers.map((spn) => ({
              estimate_id: header.id,
              supply_point_number: spn,
            }))
          )
          .execute();

        await trx
          .insertInto('recontract_plants')
          .values(
            estimate.plants.map((plant) => ({
              estimate_id: header.id,
              capacity_mw: plant.capacityMw,
              ppa_unit_price_yen_per_kwh: plant.ppaUnitPriceYenPerKwh,
            }))
          )
          .execute();

        const transition = await trx
          .updateTable('contracts')
          .set({ status: 'RECONTRACT_ESTIMATE' })
          .where('supply_point_number', 'in', estimate.supplyPointNumbers)
          .where('status', '=', 'UNDER_CONTRACT')
          .executeTakeFirst();

        return {
          estimateId: header.id,
          transitionedContracts: Number(transition.numUpdatedRows),
        };
      });
    } catch (error) {
      if (error instanceof EstimateRejected) {
        this.log.info({ reason: error.reason.message }, 'Recontract estimate rejected');
        return err(error.reason);
      }

      const violation = asIntegrityViolation(error);
      if (violation !== null) {
        this.log.warn({ violation }, 'Recontract estimate violated a constraint');
        return err(createConstraintViolationError(violation.message));
      }

      this.log.error({ err: error }, 'Failed to create recontract estimate');
      return err(createDatabaseError('Failed to create recontract estimate', error));
    }

    this.log.info(committed, 'Recontract estimate created');

    const reloaded = await this.findById(committed.estimateId);
    if (reloaded.isErr()) {
      return err(reloaded.error);
    }
    if (reloaded.value === null) {
      return err(
        createDatabaseError(`Estimate ${String(committed.estimateId)} missing after commit`)
      );
    }

    return ok({
      estimate: reloaded.value,
      transitionedContracts: committed.transitionedContracts,
    });
  }

  async findById(id: number): Promise<Result<RecontractEstimate | null, RecontractError>> {
    try {
      return ok(await loadEstimate(this.db, id));
    } catch (error) {
      this.log.error({ err: error, id }, 'Failed to load recontract estimate');
      return err(createDatabaseError(`Failed to load recontract estimate ${String(id)}`, error));
    }
  }
}

/**
 * Factory function to create the recontracts repository.
 */
export const makeRecontractRepo = (options: RecontractRepoOptions): RecontractRepository => {
  return new KyselyRecontractRepo(options);
};
