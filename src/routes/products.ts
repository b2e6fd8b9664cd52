import type { FastifyInstance } from 'fastify';
import type { Services } from '../container.js';
import { ResourceNotFoundError } from '../domain/errors/index.js';

export async function productRoutes(app: FastifyInstance, services: Services): Promise<void> {
  app.post<{
    Body: { query: string };
  }>('/v1/products/resolve', {
    schema: {
      tags: ['products'],
      description: 'Resolve a free-text product name to a catalog product (with live quote), a short list of candidates, or nothing',
      body: {
        type: 'object',
        required: ['query'],
        properties: {
          query: { type: 'string', minLength: 1, maxLength: 200 },
        },
      },
    },
  }, async (request, reply) => {
    const result = await services.batchResolver.resolveOne(request.body.query);

    return reply.code(200).send({
      data: result,
      timestamp: new Date().toISOString(),
    });
  });

  app.post<{
    Body: { queries: string[] };
  }>('/v1/products/resolve-batch', {
    schema: {
      tags: ['products'],
      description: 'Resolve a shopping list; each item is resolved and quoted independently, results follow input order',
      body: {
        type: 'object',
        required: ['queries'],
        properties: {
          queries: {
            type: 'array',
            minItems: 1,
            maxItems: 30,
            items: { type: 'string', minLength: 1, maxLength: 200 },
          },
        },
      },
    },
  }, async (request, reply) => {
    const results = await services.batchResolver.resolveMany(request.body.queries);

    return reply.code(200).send({
      data: results,
      timestamp: new Date().toISOString(),
    });
  });

  app.get<{
    Params: { productId: string };
  }>('/v1/products/:productId/quote', {
    schema: {
      tags: ['products'],
      description: 'Live price and stock for a product',
      params: {
        type: 'object',
        required: ['productId'],
        properties: {
          productId: { type: 'string', pattern: '^[0-9]{8,14}$' },
        },
      },
    },
  }, async (request, reply) => {
    const { productId } = request.params;
    const quote = await services.oracle.getQuote(productId);
    if (!quote) throw new ResourceNotFoundError('Price quote', productId);

    return reply.code(200).send({
      data: quote,
      timestamp: new Date().toISOString(),
    });
  });

  app.get<{
    Params: { neighborhood: string };
  }>('/v1/delivery-zones/:neighborhood', {
    schema: {
      tags: ['delivery'],
      description: 'Delivery fee for a neighborhood; unserved neighborhoods return served=false',
      params: {
        type: 'object',
        required: ['neighborhood'],
        properties: {
          neighborhood: { type: 'string', minLength: 1, maxLength: 120 },
        },
      },
    },
  }, async (request, reply) => {
    return reply.code(200).send({
      data: services.zones.feeFor(request.params.neighborhood),
      timestamp: new Date().toISOString(),
    });
  });
}
