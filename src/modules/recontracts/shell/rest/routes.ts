/**
 * Recontracts REST Routes
 *
 * Endpoints:
 * - POST /recontracts              - Create an estimate (201)
 * - GET  /recontracts/:estimateId  - Estimate with supply points and plants
 */

import {
  CreateRecontractBodySchema,
  CreatedRecontractEstimateSchema,
  ErrorResponseSchema,
  EstimateIdParamsSchema,
  RecontractEstimateSchema,
  type CreateRecontractBody,
  type EstimateIdParams,
  type RecontractEstimateResponse,
} from './schemas.js';
import { toErrorResponse } from '../../../../common/types/errors.js';
import { toLocalIsoDate } from '../../../../common/utils/dates.js';
import { getHttpStatusForError } from '../../core/errors.js';
import { createRecontractEstimate } from '../../core/usecases/create-recontract-estimate.js';
import { getRecontractEstimate } from '../../core/usecases/get-recontract-estimate.js';

import type { RecontractRepository } from '../../core/ports.js';
import type { CreateRecontractEstimateInput, RecontractEstimate } from '../../core/types.js';
import type { FastifyPluginAsync } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeRecontractRoutesDeps {
  recontractRepo: RecontractRepository;
  /** Clock used for the desired_quote_date window */
  now?: () => Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const toCreateInput = (body: CreateRecontractBody): CreateRecontractEstimateInput => ({
  planId: body.plan_id,
  customerId: body.customer_id,
  desiredQuoteDate: body.desired_quote_date,
  quoteEffectiveDays: body.quote_effective_days,
  remarks: body.remarks ?? null,
  supplyPointNumbers: body.supply_points.map((sp) => sp.supply_point_number),
  plants: (body.plants ?? []).map((plant) => ({
    capacityMw: plant.capacity_mw,
    ppaUnitPriceYenPerKwh: plant.ppa_unit_price_yen_per_kwh ?? null,
  })),
});

/**
 * Formats an estimate for API response.
 */
export const formatEstimate = (estimate: RecontractEstimate): RecontractEstimateResponse => ({
  id: estimate.id,
  plan_id: estimate.planId,
  customer_id: estimate.customerId,
  desired_quote_date: estimate.desiredQuoteDate,
  quote_effective_days: estimate.quoteEffectiveDays,
  remarks: estimate.remarks,
  supply_points: estimate.supplyPoints.map((sp) => ({
    id: sp.id,
    supply_point_number: sp.supplyPointNumber,
  })),
  plants: estimate.plants.map((plant) => ({
    id: plant.id,
    capacity_mw: plant.capacityMw,
    ppa_unit_price_yen_per_kwh: plant.ppaUnitPriceYenPerKwh,
  })),
});

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeRecontractRoutes = (deps: MakeRecontractRoutesDeps): FastifyPluginAsync => {
  const { recontractRepo, now = () => new Date() } = deps;

  return async (fastify) => {
    fastify.post<{ Body: CreateRecontractBody }>(
      '/recontracts',
      {
        schema: {
          body: CreateRecontractBodySchema,
          response: {
            201: CreatedRecontractEstimateSchema,
            400: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await createRecontractEstimate(
          { recontractRepo },
          toCreateInput(request.body),
          toLocalIsoDate(now())
        );

        if (result.isErr()) {
          return reply
            .status(getHttpStatusForError(result.error))
            .send(toErrorResponse(result.error));
        }

        return reply.status(201).send({
          ...formatEstimate(result.value.estimate),
          transitioned_contracts: result.value.transitionedContracts,
        });
      }
    );

    fastify.get<{ Params: EstimateIdParams }>(
      '/recontracts/:estimateId',
      {
        schema: {
          params: EstimateIdParamsSchema,
          response: {
            200: RecontractEstimateSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await getRecontractEstimate({ recontractRepo }, request.params.estimateId);

        if (result.isErr()) {
          return reply
            .status(getHttpStatusForError(result.error))
            .send(toErrorResponse(result.error));
        }

        return reply.status(200).send(formatEstimate(result.value));
      }
    );
  };
};
