/**
 * Recontracts REST API - TypeBox Schemas
 *
 * Shape and length limits are enforced here; domain rules (validity window,
 * desired date range, references) are checked by the use case.
 */

import { Type, type Static } from '@sinclair/typebox';

import {
  ErrorResponseSchema,
  IdSchema,
  Int4Schema,
  IsoDateSchema,
  Nullable,
} from '../../../../common/schemas/base.js';
import {
  MAX_PLANTS,
  MAX_REMARKS_LENGTH,
  MAX_SUPPLY_POINTS,
  MAX_SUPPLY_POINT_NUMBER_LENGTH,
  MIN_SUPPLY_POINTS,
} from '../../core/types.js';

export { ErrorResponseSchema };

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const SupplyPointBodySchema = Type.Object({
  supply_point_number: Type.String({ minLength: 1, maxLength: MAX_SUPPLY_POINT_NUMBER_LENGTH }),
});

export const PlantBodySchema = Type.Object({
  capacity_mw: Type.Number({ minimum: 0 }),
  ppa_unit_price_yen_per_kwh: Type.Optional(Nullable(Type.Number({ minimum: 0 }))),
});

export const CreateRecontractBodySchema = Type.Object({
  plan_id: Int4Schema,
  customer_id: Int4Schema,
  desired_quote_date: IsoDateSchema,
  quote_effective_days: Type.Integer(),
  remarks: Type.Optional(Nullable(Type.String({ maxLength: MAX_REMARKS_LENGTH }))),
  supply_points: Type.Array(SupplyPointBodySchema, {
    minItems: MIN_SUPPLY_POINTS,
    maxItems: MAX_SUPPLY_POINTS,
  }),
  plants: Type.Optional(Type.Array(PlantBodySchema, { maxItems: MAX_PLANTS })),
});

export type CreateRecontractBody = Static<typeof CreateRecontractBodySchema>;

export const EstimateIdParamsSchema = Type.Object({
  estimateId: IdSchema,
});

export type EstimateIdParams = Static<typeof EstimateIdParamsSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

const estimateProperties = {
  id: Type.Integer(),
  plan_id: Type.Integer(),
  customer_id: Type.Integer(),
  desired_quote_date: IsoDateSchema,
  quote_effective_days: Type.Integer(),
  remarks: Nullable(Type.String()),
  supply_points: Type.Array(
    Type.Object({
      id: Type.Integer(),
      supply_point_number: Type.String(),
    })
  ),
  plants: Type.Array(
    Type.Object({
      id: Type.Integer(),
      capacity_mw: Type.Number(),
      ppa_unit_price_yen_per_kwh: Nullable(Type.Number()),
    })
  ),
};

export const RecontractEstimateSchema = Type.Object(estimateProperties);

export type RecontractEstimateResponse = Static<typeof RecontractEstimateSchema>;

export const CreatedRecontractEstimateSchema = Type.Object({
  ...estimateProperties,
  transitioned_contracts: Type.Integer(),
});
