/**
 * PPA Quotations REST Routes
 *
 * Endpoints:
 * - GET /ppa_quotations             - Paginated bundle list with aggregates
 * - GET /projects/ppa-quotations    - Same list under the older path
 * - GET /ppa_quotations/:bundleId   - Bundle detail with per-project rollups
 */

import {
  BundleIdParamsSchema,
  ErrorResponseSchema,
  ListPpaQuotationsQuerySchema,
  PpaQuotationDetailSchema,
  PpaQuotationListResponseSchema,
  type BundleIdParams,
  type ListPpaQuotationsQuery,
} from './schemas.js';
import { toErrorResponse } from '../../../../common/types/errors.js';
import { getHttpStatusForError } from '../../core/errors.js';
import { getPpaQuotationDetail } from '../../core/usecases/get-ppa-quotation-detail.js';
import { listPpaQuotations } from '../../core/usecases/list-ppa-quotations.js';

import type { PpaQuotationRepository } from '../../core/ports.js';
import type { ListPpaQuotationsInput } from '../../core/types.js';
import type { FastifyPluginAsync } from 'fastify';

const LIST_PATHS = ['/ppa_quotations', '/projects/ppa-quotations'] as const;

export interface MakePpaQuotationRoutesDeps {
  ppaQuotationRepo: PpaQuotationRepository;
}

/**
 * Folds query aliases into use case input.
 */
export const toListInput = (query: ListPpaQuotationsQuery): ListPpaQuotationsInput => ({
  page: query.page,
  rows: query.rows ?? query.size,
  sortBy: query.sort_by,
  sortOrder: query.sort_order,
  filter: {
    customerId: query.customer_id,
    agencyId: query.agency_id,
    area: query.area ?? query.region,
    quoteStatus: query.quote_status ?? query.pricing_status,
    offerStatus: query.offer_status,
  },
});

export const makePpaQuotationRoutes = (deps: MakePpaQuotationRoutesDeps): FastifyPluginAsync => {
  const { ppaQuotationRepo } = deps;

  return async (fastify) => {
    const listSchema = {
      querystring: ListPpaQuotationsQuerySchema,
      response: {
        200: PpaQuotationListResponseSchema,
        500: ErrorResponseSchema,
      },
    };

    for (const path of LIST_PATHS) {
      fastify.get<{ Querystring: ListPpaQuotationsQuery }>(
        path,
        { schema: listSchema },
        async (request, reply) => {
          const result = await listPpaQuotations({ ppaQuotationRepo }, toListInput(request.query));

          if (result.isErr()) {
            return reply
              .status(getHttpStatusForError(result.error))
              .send(toErrorResponse(result.error));
          }

          return reply.status(200).send(result.value);
        }
      );
    }

    fastify.get<{ Params: BundleIdParams }>(
      '/ppa_quotations/:bundleId',
      {
        schema: {
          params: BundleIdParamsSchema,
          response: {
            200: PpaQuotationDetailSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await getPpaQuotationDetail({ ppaQuotationRepo }, request.params.bundleId);

        if (result.isErr()) {
          return reply
            .status(getHttpStatusForError(result.error))
            .send(toErrorResponse(result.error));
        }

        return reply.status(200).send(result.value);
      }
    );
  };
};
