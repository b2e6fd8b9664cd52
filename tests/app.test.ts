import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../src/index.js';
import { loadConfig } from '../src/config.js';
import { PricingOracleMock } from '../src/infrastructure/clients/PricingOracleMock.js';
import { OrderIntakeClientMock } from '../src/infrastructure/clients/OrderIntakeClientMock.js';
import { DATA_DIR, IDS, TestClock, seedQuotes } from './fixtures.js';

const CUSTOMER = '5511999990000';

describe('HTTP API', () => {
  let app: FastifyInstance;
  let oracle: PricingOracleMock;
  let intake: OrderIntakeClientMock;

  beforeEach(async () => {
    oracle = new PricingOracleMock(seedQuotes);
    intake = new OrderIntakeClientMock();
    app = await buildApp({
      config: loadConfig({ DATA_DIR }),
      overrides: { oracle, orderIntake: intake, clock: new TestClock().now },
      logger: false,
    });
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports health', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok', catalogSize: 35 });
  });

  describe('products', () => {
    it('resolves a product with its live quote', async () => {
      const response = await app.inject({ method: 'POST', url: '/v1/products/resolve', payload: { query: 'tomate' } });

      expect(response.statusCode).toBe(200);
      const { data } = response.json();
      expect(data.resolution).toMatchObject({ kind: 'unique', product: { productId: IDS.tomate } });
      expect(data.quote).toMatchObject({ unitPrice: 7.99, quantityAvailable: 120 });
    });

    it('resolves a shopping list in order', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/products/resolve-batch',
        payload: { queries: ['banana', 'arroz', 'picanha argentina'] },
      });

      const { data } = response.json();
      expect(data.map((r: { resolution: { kind: string } }) => r.resolution.kind)).toEqual([
        'ambiguous',
        'unique',
        'not_found',
      ]);
    });

    it('rejects a request without a query', async () => {
      const response = await app.inject({ method: 'POST', url: '/v1/products/resolve', payload: {} });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('VALIDATION_ERROR');
    });

    it('returns 404 for products without a quote', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/products/7890000000000/quote' });

      expect(response.statusCode).toBe(404);
      expect(response.json().error.code).toBe('RESOURCE_NOT_FOUND');
    });

    it('returns 503 when the oracle is down', async () => {
      oracle.failNextCalls(1);

      const response = await app.inject({ method: 'GET', url: `/v1/products/${IDS.leite}/quote` });

      expect(response.statusCode).toBe(503);
      expect(response.json().error.code).toBe('ORACLE_UNAVAILABLE');
    });

    it('looks up delivery fees', async () => {
      const served = await app.inject({ method: 'GET', url: `/v1/delivery-zones/${encodeURIComponent('São José')}` });
      const unserved = await app.inject({ method: 'GET', url: '/v1/delivery-zones/Lugar%20Nenhum' });

      expect(served.json().data).toEqual({ served: true, zone: { neighborhood: 'São José', fee: 6 } });
      expect(unserved.json().data).toEqual({ served: false, neighborhood: 'Lugar Nenhum' });
    });
  });

  describe('sessions', () => {
    it('opens a session once and continues it afterwards', async () => {
      const created = await app.inject({ method: 'POST', url: `/v1/sessions/${CUSTOMER}` });
      const continued = await app.inject({ method: 'POST', url: `/v1/sessions/${CUSTOMER}` });

      expect(created.statusCode).toBe(201);
      expect(created.json().data.outcome).toBe('created');
      expect(continued.statusCode).toBe(200);
      expect(continued.json().data.outcome).toBe('continued');
    });

    it('returns 404 for an unknown session', async () => {
      const response = await app.inject({ method: 'GET', url: `/v1/sessions/${CUSTOMER}` });

      expect(response.statusCode).toBe(404);
    });

    it('validates line ids in the path', async () => {
      const response = await app.inject({ method: 'DELETE', url: `/v1/sessions/${CUSTOMER}/items/not-a-uuid` });

      expect(response.statusCode).toBe(400);
    });

    it('takes an order from cart to intake', async () => {
      const added = await app.inject({
        method: 'POST',
        url: `/v1/sessions/${CUSTOMER}/items`,
        payload: { productId: IDS.tomate, quantity: 5, unit: 'unit' },
      });
      expect(added.statusCode).toBe(200);
      expect(added.json().data.lines[0].massEstimate.massKg).toBe(0.75);

      const summary = await app.inject({ method: 'POST', url: `/v1/sessions/${CUSTOMER}/summary` });
      expect(summary.json().data).toMatchObject({ state: 'reviewing_summary', total: 5.99, paymentClass: 'variable_weight' });

      const delivery = await app.inject({
        method: 'PUT',
        url: `/v1/sessions/${CUSTOMER}/delivery`,
        payload: { recipientName: 'Maria Teste', address: 'Rua das Flores, 100', neighborhood: 'Curicaca' },
      });
      expect(delivery.json().data).toMatchObject({ state: 'awaiting_payment_selection', total: 12.99 });

      const pix = await app.inject({
        method: 'POST',
        url: `/v1/sessions/${CUSTOMER}/payment`,
        payload: { method: 'pix', timing: 'prepaid' },
      });
      expect(pix.statusCode).toBe(422);
      expect(pix.json().error.code).toBe('PIX_NOT_ALLOWED_PREPAID');

      const cash = await app.inject({
        method: 'POST',
        url: `/v1/sessions/${CUSTOMER}/payment`,
        payload: { method: 'cash' },
      });
      expect(cash.statusCode).toBe(200);

      const submitted = await app.inject({ method: 'POST', url: `/v1/sessions/${CUSTOMER}/submit` });
      expect(submitted.statusCode).toBe(201);
      expect(submitted.json().data).toMatchObject({ status: 'submitted', order: { total: 12.99 } });
      expect(intake.getSubmittedOrders()).toHaveLength(1);
    });

    it('reports state conflicts as 409', async () => {
      await app.inject({ method: 'POST', url: `/v1/sessions/${CUSTOMER}` });

      const response = await app.inject({ method: 'POST', url: `/v1/sessions/${CUSTOMER}/submit` });

      expect(response.statusCode).toBe(409);
      expect(response.json().error).toMatchObject({
        code: 'INVALID_STATE_TRANSITION',
        details: { operation: 'submit', state: 'draft' },
      });
    });

    it('cancels a session', async () => {
      await app.inject({
        method: 'POST',
        url: `/v1/sessions/${CUSTOMER}/items`,
        payload: { productId: IDS.leite, quantity: 1 },
      });

      const response = await app.inject({ method: 'DELETE', url: `/v1/sessions/${CUSTOMER}` });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toMatchObject({ state: 'cancelled', lines: [] });
    });
  });
});
