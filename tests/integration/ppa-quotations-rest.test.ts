/**
 * Integration tests for the PPA quotation endpoints
 */

import { describe, expect, it, beforeAll, afterAll } from 'vitest';

import { createApp } from '@/app/build-app.js';

import {
  makeFakeBundle,
  makeFakeDataset,
  makeFakePpaQuotationRepo,
  makeTestAppDeps,
} from '../fixtures/fakes.js';

import type { FastifyInstance } from 'fastify';

const data = makeFakeDataset({
  bundles: [
    makeFakeBundle({ id: 9001, area: 'TOKYO', updatedAt: new Date(2025, 6, 1, 9, 5) }),
    makeFakeBundle({
      id: 9002,
      customerId: 502,
      agencyId: null,
      area: 'TOHOKU',
      quoteValidDays: 30,
      quoteStatus: 'SUBMITTED',
      updatedAt: new Date(2025, 6, 2, 10, 0),
    }),
    makeFakeBundle({
      id: 9003,
      agencyId: 24,
      area: 'KANSAI',
      offerStatus: 'OFFERED',
      updatedAt: new Date(2025, 6, 3, 11, 30),
    }),
  ],
  projects: [{ id: 12001, bundleId: 9001, capacityMw: 1.2 }],
  supplyPoints: [
    { id: 1, bundleId: 9001, projectId: 12001, contractKw: 500 },
    { id: 2, bundleId: 9001, projectId: 12001, contractKw: 440 },
    { id: 3, bundleId: 9001, projectId: null, contractKw: 600 },
    { id: 4, bundleId: 9001, projectId: null, contractKw: 450 },
    { id: 5, bundleId: 9001, projectId: null, contractKw: 400 },
    { id: 6, bundleId: 9001, projectId: null, contractKw: 430 },
  ],
});

describe('PPA quotation REST API', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await createApp({ fastifyOptions: { logger: false }, deps: makeTestAppDeps({ data }) });
  });

  afterAll(async () => {
    await app.close();
  });

  describe('GET /ppa_quotations', () => {
    it('lists bundles newest first with counts', async () => {
      const response = await app.inject({ method: 'GET', url: '/ppa_quotations' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.total_count).toBe(3);
      expect(body.filtered_count).toBe(3);
      expect(body.data.map((item: { id: number }) => item.id)).toEqual([9003, 9002, 9001]);
    });

    it('serializes the display row', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/ppa_quotations?customer_id=501&area=TOKYO',
      });

      expect(response.json().data).toEqual([
        {
          id: 9001,
          tender_number: 'PPA00009001',
          customer_name: 'Alpha Foods',
          plan_id: 101,
          plan_name_en: 'PPA Standard',
          plan_name_jp: 'PPA Standard',
          sales_agent_id: 23,
          sales_agent_name: 'North Agency',
          region_id: 3,
          region_name_en: 'Tokyo',
          region_name_jp: '東京',
          quote_request_date: '2025-07-01',
          last_date_for_quotation: '2025-07-15',
          quote_valid_until: '2025-08-30 (60日)',
          contract_start_date: '2026-04-01',
          num_of_spids: 6,
          peak_demand: null,
          annual_usage: null,
          pricing_status_id: 1,
          pricing_status_en: 'pending',
          pricing_status_jp: '保留中',
          offer_status_id: 1,
          offer_status_en: 'pending',
          offer_status_jp: '保留中',
          last_updated: '2025-07-01 09:05',
          has_quotation_file: false,
          summary_number: 'PPA00009001',
          project_count: 1,
          contract_power_kw: 2820,
          expiration_date: '2025-08-30',
        },
      ]);
    });

    it('pages with rows and keeps counts unpaged', async () => {
      const response = await app.inject({ method: 'GET', url: '/ppa_quotations?page=2&rows=2' });

      const body = response.json();
      expect(body.data.map((item: { id: number }) => item.id)).toEqual([9001]);
      expect(body.total_count).toBe(3);
    });

    it('accepts the size, region and pricing_status aliases', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/ppa_quotations?size=1&region=TOHOKU&pricing_status=SUBMITTED',
      });

      const body = response.json();
      expect(body.filtered_count).toBe(1);
      expect(body.data[0].id).toBe(9002);
      expect(body.data[0].sales_agent_id).toBeNull();
      expect(body.data[0].pricing_status_en).toBe('preliminary');
    });

    it('filters by offer status and agency', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/ppa_quotations?offer_status=OFFERED&agency_id=24',
      });

      expect(response.json().data.map((item: { id: number }) => item.id)).toEqual([9003]);
    });

    it('sorts by a whitelisted column', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/ppa_quotations?sort_by=region&sort_order=asc',
      });

      expect(response.json().data.map((item: { region_name_en: string }) => item.region_name_en)).toEqual(
        ['Kansai', 'Tohoku', 'Tokyo']
      );
    });

    it('falls back to updated_at for an unknown sort column', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/ppa_quotations?sort_by=password',
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().data.map((item: { id: number }) => item.id)).toEqual([9003, 9002, 9001]);
    });

    it('rejects a page size above 200', async () => {
      const response = await app.inject({ method: 'GET', url: '/ppa_quotations?rows=201' });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('ValidationError');
    });

    it('rejects filter ids beyond the INTEGER range', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/ppa_quotations?customer_id=3000000000',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        ok: false,
        error: 'ValidationError',
        message: 'querystring/customer_id must be <= 2147483647',
      });
    });

    it('serves the same list under /projects/ppa-quotations', async () => {
      const legacy = await app.inject({ method: 'GET', url: '/projects/ppa-quotations?rows=2' });
      const current = await app.inject({ method: 'GET', url: '/ppa_quotations?rows=2' });

      expect(legacy.statusCode).toBe(200);
      expect(legacy.json()).toEqual(current.json());
    });
  });

  describe('GET /ppa_quotations/:bundleId', () => {
    it('returns the bundle with per-project rollups', async () => {
      const response = await app.inject({ method: 'GET', url: '/ppa_quotations/9001' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.id).toBe(9001);
      expect(body.supply_points_count).toBe(6);
      expect(body.contract_power_kw).toBe(2820);
      expect(body.projects).toEqual([
        {
          project_id: 12001,
          capacity_mw: 1.2,
          capacity_kw: 1200,
          num_of_spids: 2,
          contract_power_kw: 940,
        },
      ]);
    });

    it('returns 404 for an unknown bundle', async () => {
      const response = await app.inject({ method: 'GET', url: '/ppa_quotations/424242' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        ok: false,
        error: 'BundleNotFoundError',
        message: 'Bundle not found',
      });
    });

    it('rejects a bundle id beyond the INTEGER range with 400', async () => {
      const response = await app.inject({ method: 'GET', url: '/ppa_quotations/3000000000' });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        ok: false,
        error: 'ValidationError',
        message: 'params/bundleId must be <= 2147483647',
      });
    });
  });

  it('hides database details behind a generic 500', async () => {
    const failing = await createApp({
      fastifyOptions: { logger: false },
      deps: makeTestAppDeps({ ppaQuotationRepo: makeFakePpaQuotationRepo({ failing: true }) }),
    });

    const response = await failing.inject({ method: 'GET', url: '/ppa_quotations' });
    await failing.close();

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      ok: false,
      error: 'DatabaseError',
      message: 'An unexpected database error occurred',
    });
  });
});
