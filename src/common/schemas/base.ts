/**
 * Common TypeBox schemas used across modules
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';

import { OFFER_STATUSES, QUOTE_STATUSES } from '../types/enums.js';

/**
 * Calendar date 'YYYY-MM-DD'
 */
export const IsoDateSchema = Type.String({
  pattern: '^\\d{4}-\\d{2}-\\d{2}$',
  description: 'Calendar date (YYYY-MM-DD)',
});

/**
 * `T | null`
 */
export const Nullable = <T extends TSchema>(schema: T) => Type.Union([schema, Type.Null()]);

/** Largest value of a PostgreSQL INTEGER column */
export const PG_INT4_MAX = 2_147_483_647;

/**
 * Positive INTEGER key
 */
export const IdSchema = Type.Integer({ minimum: 1, maximum: PG_INT4_MAX });

/**
 * Any value an INTEGER column accepts
 */
export const Int4Schema = Type.Integer({ minimum: -PG_INT4_MAX - 1, maximum: PG_INT4_MAX });

export const QuoteStatusSchema = Type.Union(QUOTE_STATUSES.map((status) => Type.Literal(status)));

export const OfferStatusSchema = Type.Union(OFFER_STATUSES.map((status) => Type.Literal(status)));

/**
 * Standard error response
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type code' }),
  message: Type.String({ description: 'Human-readable error message' }),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
