import { describe, expect, it } from 'vitest';

import { createRecontractEstimate } from '@/modules/recontracts/core/usecases/create-recontract-estimate.js';
import { getRecontractEstimate } from '@/modules/recontracts/core/usecases/get-recontract-estimate.js';

import { makeRecontractInput } from '../../fixtures/builders.js';
import {
  makeFakeDataset,
  makeFakeRecontractRepo,
  type FakeContract,
  type FakeDataset,
} from '../../fixtures/fakes.js';

const TODAY = '2025-07-01';

const contract = (overrides: Partial<FakeContract>): FakeContract => ({
  id: 1,
  customerId: 501,
  planId: 101,
  supplyPointNumber: 'SPN-A',
  endDate: '2025-12-31',
  status: 'UNDER_CONTRACT',
  ...overrides,
});

const makeData = (): FakeDataset =>
  makeFakeDataset({
    contracts: [
      contract({ id: 1, supplyPointNumber: 'SPN-A', status: 'UNDER_CONTRACT' }),
      contract({ id: 2, supplyPointNumber: 'SPN-B', status: 'RECONTRACTED' }),
      contract({ id: 3, supplyPointNumber: 'SPN-C', status: 'UNDER_CONTRACT' }),
    ],
  });

describe('createRecontractEstimate', () => {
  it('persists the estimate with children and returns it', async () => {
    const recontractRepo = makeFakeRecontractRepo({ data: makeData() });

    const result = await createRecontractEstimate(
      { recontractRepo },
      makeRecontractInput({
        remarks: 'renewal',
        supplyPointNumbers: ['SPN-A'],
        plants: [{ capacityMw: 1.5, ppaUnitPriceYenPerKwh: 13 }],
      }),
      TODAY
    );

    const created = result._unsafeUnwrap();
    expect(created.estimate).toEqual({
      id: 1,
      planId: 101,
      customerId: 501,
      desiredQuoteDate: '2025-07-10',
      quoteEffectiveDays: 30,
      remarks: 'renewal',
      supplyPoints: [{ id: 1, supplyPointNumber: 'SPN-A' }],
      plants: [
        { id: 1, capacityMw: 0, ppaUnitPriceYenPerKwh: null },
        { id: 2, capacityMw: 1.5, ppaUnitPriceYenPerKwh: 13 },
      ],
    });
    expect(recontractRepo.estimates).toHaveLength(1);
  });

  it('moves only matching UNDER_CONTRACT contracts to RECONTRACT_ESTIMATE', async () => {
    const data = makeData();
    const recontractRepo = makeFakeRecontractRepo({ data });

    const result = await createRecontractEstimate(
      { recontractRepo },
      makeRecontractInput({ supplyPointNumbers: ['SPN-A', 'SPN-B'] }),
      TODAY
    );

    expect(result._unsafeUnwrap().transitionedContracts).toBe(1);
    expect(data.contracts.map((c) => [c.supplyPointNumber, c.status])).toEqual([
      ['SPN-A', 'RECONTRACT_ESTIMATE'],
      ['SPN-B', 'RECONTRACTED'],
      ['SPN-C', 'UNDER_CONTRACT'],
    ]);
  });

  it('rejects an unknown customer and leaves everything untouched', async () => {
    const data = makeData();
    const recontractRepo = makeFakeRecontractRepo({ data });

    const result = await createRecontractEstimate(
      { recontractRepo },
      makeRecontractInput({ customerId: 999 }),
      TODAY
    );

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'ValidationError',
      message: 'Invalid customer_id: 999',
    });
    expect(recontractRepo.estimates).toEqual([]);
    expect(data.contracts[0]?.status).toBe('UNDER_CONTRACT');
  });

  it('rejects an unknown plan', async () => {
    const recontractRepo = makeFakeRecontractRepo({ data: makeData() });

    const result = await createRecontractEstimate(
      { recontractRepo },
      makeRecontractInput({ planId: 999 }),
      TODAY
    );

    expect(result._unsafeUnwrapErr().message).toBe('Invalid plan_id: 999');
  });

  it('rolls back when a constraint fails at commit', async () => {
    const data = makeData();
    const recontractRepo = makeFakeRecontractRepo({
      data,
      violateConstraint: 'value too long for type character varying(64)',
    });

    const result = await createRecontractEstimate({ recontractRepo }, makeRecontractInput(), TODAY);

    expect(result._unsafeUnwrapErr().message).toBe(
      'Database constraint error: value too long for type character varying(64)'
    );
    expect(recontractRepo.estimates).toEqual([]);
    expect(data.contracts[0]?.status).toBe('UNDER_CONTRACT');
  });

  it('does not reach the repository when validation fails', async () => {
    const recontractRepo = makeFakeRecontractRepo({ failing: true });

    const result = await createRecontractEstimate(
      { recontractRepo },
      makeRecontractInput({ quoteEffectiveDays: 90 }),
      TODAY
    );

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'ValidationError',
      message: 'quote_effective_days must be 30 or 60',
    });
  });
});

describe('getRecontractEstimate', () => {
  it('returns a stored estimate', async () => {
    const recontractRepo = makeFakeRecontractRepo();
    await createRecontractEstimate({ recontractRepo }, makeRecontractInput(), TODAY);

    const result = await getRecontractEstimate({ recontractRepo }, 1);

    expect(result._unsafeUnwrap().supplyPoints).toEqual([{ id: 1, supplyPointNumber: 'SPN-A' }]);
  });

  it('returns EstimateNotFoundError for an unknown id', async () => {
    const result = await getRecontractEstimate({ recontractRepo: makeFakeRecontractRepo() }, 7);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'EstimateNotFoundError',
      message: 'Estimate not found',
      estimateId: 7,
    });
  });
});
