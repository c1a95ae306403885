/**
 * Contracts REST Routes
 *
 * Endpoints:
 * - GET /contracts/renewal-cases - Contracts ending in the renewal month
 */

import { ErrorResponseSchema, RenewalCaseListSchema, type RenewalCaseResponse } from './schemas.js';
import { toErrorResponse } from '../../../../common/types/errors.js';
import { toLocalIsoDate } from '../../../../common/utils/dates.js';
import { getHttpStatusForError } from '../../core/errors.js';
import { listRenewalCases } from '../../core/usecases/list-renewal-cases.js';

import type { ContractsRepository } from '../../core/ports.js';
import type { RenewalCase } from '../../core/types.js';
import type { FastifyPluginAsync, RouteGenericInterface } from 'fastify';

export interface MakeContractRoutesDeps {
  contractsRepo: ContractsRepository;
  now?: () => Date;
}

const formatRenewalCase = (renewalCase: RenewalCase): RenewalCaseResponse => ({
  contract_id: renewalCase.contractId,
  customer_name: renewalCase.customerName,
  supply_point_number: renewalCase.supplyPointNumber,
  plan_name: renewalCase.planName,
  end_date: renewalCase.endDate,
});

export const makeContractRoutes = (deps: MakeContractRoutesDeps): FastifyPluginAsync => {
  const { contractsRepo, now = () => new Date() } = deps;

  return async (fastify) => {
    fastify.get<RouteGenericInterface>(
      '/contracts/renewal-cases',
      {
        schema: {
          response: {
            200: RenewalCaseListSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const result = await listRenewalCases({ contractsRepo }, toLocalIsoDate(now()));

        if (result.isErr()) {
          return reply
            .status(getHttpStatusForError(result.error))
            .send(toErrorResponse(result.error));
        }

        return reply.status(200).send(result.value.map(formatRenewalCase));
      }
    );
  };
};
