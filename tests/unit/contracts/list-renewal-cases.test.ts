import { describe, expect, it } from 'vitest';

import { listRenewalCases } from '@/modules/contracts/core/usecases/list-renewal-cases.js';
import { selectRenewalCases } from '@/modules/contracts/shell/repo/contracts-repo.js';

import {
  makeCompileOnlyDb,
  makeFakeContractsRepo,
  makeFakeDataset,
  type FakeContract,
} from '../../fixtures/fakes.js';

const contract = (overrides: Partial<FakeContract>): FakeContract => ({
  id: 1,
  customerId: 501,
  planId: 101,
  supplyPointNumber: 'SPN-1',
  endDate: '2027-03-15',
  status: 'UNDER_CONTRACT',
  ...overrides,
});

describe('listRenewalCases', () => {
  const data = makeFakeDataset({
    contracts: [
      contract({ id: 1, endDate: '2027-03-31', supplyPointNumber: 'SPN-LAST' }),
      contract({ id: 2, endDate: '2027-03-01', supplyPointNumber: 'SPN-FIRST', customerId: 502 }),
      contract({ id: 3, endDate: '2027-04-01', supplyPointNumber: 'SPN-NEXT-MONTH' }),
      contract({ id: 4, endDate: '2027-02-28', supplyPointNumber: 'SPN-PREV-MONTH' }),
      contract({ id: 5, endDate: '2027-03-10', status: 'RECONTRACT_ESTIMATE' }),
      contract({ id: 6, endDate: '2027-03-10', status: 'RECONTRACTED' }),
      contract({ id: 7, endDate: '2027-03-31', supplyPointNumber: 'SPN-LAST-2', planId: 102 }),
    ],
  });

  it('returns UNDER_CONTRACT contracts ending in the renewal month by end date then id', async () => {
    const result = await listRenewalCases(
      { contractsRepo: makeFakeContractsRepo({ data }) },
      '2026-10-19'
    );

    expect(result._unsafeUnwrap()).toEqual([
      {
        contractId: 2,
        customerName: 'Beta Metals',
        supplyPointNumber: 'SPN-FIRST',
        planName: 'PPA Standard',
        endDate: '2027-03-01',
      },
      {
        contractId: 1,
        customerName: 'Alpha Foods',
        supplyPointNumber: 'SPN-LAST',
        planName: 'PPA Standard',
        endDate: '2027-03-31',
      },
      {
        contractId: 7,
        customerName: 'Alpha Foods',
        supplyPointNumber: 'SPN-LAST-2',
        planName: 'PPA Green',
        endDate: '2027-03-31',
      },
    ]);
  });

  it('returns an empty list when nothing ends in the window', async () => {
    const result = await listRenewalCases(
      { contractsRepo: makeFakeContractsRepo({ data }) },
      '2030-01-01'
    );

    expect(result._unsafeUnwrap()).toEqual([]);
  });
});

describe('selectRenewalCases', () => {
  it('filters on status and a half-open end date range', () => {
    const { sql, parameters } = selectRenewalCases(makeCompileOnlyDb(), {
      start: '2027-03-01',
      end: '2027-04-01',
    }).compile();

    expect(sql).toContain(
      'where "ct"."status" = $1 and "ct"."end_date" >= $2 and "ct"."end_date" < $3 order by "ct"."end_date" asc, "ct"."id" asc'
    );
    expect(parameters).toEqual(['UNDER_CONTRACT', '2027-03-01', '2027-04-01']);
  });
});
