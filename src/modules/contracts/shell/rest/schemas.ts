import { Type, type Static } from '@sinclair/typebox';

import { ErrorResponseSchema, IsoDateSchema } from '../../../../common/schemas/base.js';

export { ErrorResponseSchema };

export const RenewalCaseSchema = Type.Object({
  contract_id: Type.Integer(),
  customer_name: Type.String(),
  supply_point_number: Type.String(),
  plan_name: Type.String(),
  end_date: IsoDateSchema,
});

export type RenewalCaseResponse = Static<typeof RenewalCaseSchema>;

export const RenewalCaseListSchema = Type.Array(RenewalCaseSchema);
