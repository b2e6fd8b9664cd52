import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import pino from 'pino';
import { loadConfig, type AppConfig } from './config.js';
import { createServices, type ServiceOverrides } from './container.js';
import { DomainError } from './domain/errors/index.js';
import { productRoutes } from './routes/products.js';
import { sessionRoutes } from './routes/sessions.js';

export interface BuildAppOptions {
  config?: AppConfig;
  overrides?: ServiceOverrides;
  logger?: boolean;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig();

  const app = Fastify({
    logger: options.logger === false
      ? false
      : {
          level: config.logLevel,
          base: { service: 'grocery-order-engine' },
          timestamp: pino.stdTimeFunctions.isoTime,
        },
  });

  await app.register(swagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: config.apiTitle,
        description: config.apiDescription,
        version: config.apiVersion,
      },
      servers: [
        {
          url: config.apiBaseUrl ?? `http://${config.host}:${config.port}`,
          description: config.nodeEnv === 'production' ? 'Production server' : 'Development server',
        },
      ],
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'products', description: 'Product resolution and live quotes' },
        { name: 'delivery', description: 'Delivery zones and fees' },
        { name: 'sessions', description: 'Customer sessions and carts' },
        { name: 'checkout', description: 'Delivery details, payment and order submission' },
      ],
      components: {
        schemas: {
          Product: {
            type: 'object',
            required: ['productId', 'name', 'category', 'section', 'unitOfSale', 'deliveryEligible'],
            properties: {
              productId: { type: 'string', example: '2000000000011' },
              name: { type: 'string', example: 'TOMATE' },
              category: { type: 'string', enum: ['loose_weight_perishable', 'fixed_weight'] },
              section: {
                type: 'string',
                enum: ['produce', 'meat', 'bakery', 'dairy', 'grocery', 'beverages', 'cleaning', 'hygiene'],
              },
              unitOfSale: { type: 'string', enum: ['kg', 'unit'] },
              deliveryEligible: { type: 'boolean' },
              promotional: { type: 'boolean' },
            },
          },
          PriceQuote: {
            type: 'object',
            properties: {
              productId: { type: 'string' },
              unitPrice: { type: 'number', example: 7.99 },
              quantityAvailable: { type: 'number', example: 120 },
              quotedAt: { type: 'string', format: 'date-time' },
            },
          },
          CartLine: {
            type: 'object',
            properties: {
              lineId: { type: 'string', format: 'uuid' },
              product: { $ref: '#/components/schemas/Product' },
              requestedQuantity: { type: 'number' },
              requestedUnit: { type: 'string', enum: ['unit', 'kg'] },
              massEstimate: {
                type: 'object',
                properties: {
                  massKg: { type: 'number', example: 0.75 },
                  unitMassKg: { type: 'number', example: 0.15 },
                  unitCount: { type: 'integer', example: 5 },
                  source: { type: 'string', enum: ['product', 'section_default'] },
                  approximate: { type: 'boolean' },
                  notice: { type: 'string' },
                },
              },
              chargeableQuantity: { type: 'number' },
              unitPrice: { type: 'number' },
              subtotal: { type: 'number' },
              note: { type: 'string' },
              stockShortfall: { type: 'boolean' },
              quotedAt: { type: 'string', format: 'date-time' },
              addedAt: { type: 'string', format: 'date-time' },
            },
          },
          Session: {
            type: 'object',
            properties: {
              sessionId: { type: 'string', format: 'uuid' },
              customerId: { type: 'string' },
              state: {
                type: 'string',
                enum: [
                  'draft',
                  'reviewing_summary',
                  'awaiting_delivery_info',
                  'awaiting_payment_selection',
                  'awaiting_payment_confirmation',
                  'submitted',
                  'cancelled',
                ],
              },
              lines: { type: 'array', items: { $ref: '#/components/schemas/CartLine' } },
              subtotal: { type: 'number' },
              deliveryFee: { type: 'number' },
              total: { type: 'number' },
              lastActivityAt: { type: 'string', format: 'date-time' },
              lastFinalizedAt: { type: 'string', format: 'date-time', nullable: true },
            },
          },
          Error: {
            type: 'object',
            properties: {
              error: {
                type: 'object',
                properties: {
                  code: { type: 'string' },
                  message: { type: 'string' },
                  statusCode: { type: 'integer' },
                  details: { type: 'object' },
                },
              },
              timestamp: { type: 'string', format: 'date-time' },
            },
          },
        },
      },
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
  });

  await app.register(cors, {
    origin: config.corsOrigin,
  });

  const services = createServices(config, app.log, options.overrides);
  app.addHook('onClose', async () => {
    services.close();
  });

  app.get('/health', {
    schema: {
      tags: ['health'],
      description: 'Health check endpoint for load balancers and monitoring',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string', example: 'ok' },
            catalogSize: { type: 'integer' },
            timestamp: { type: 'string', format: 'date-time' },
          },
        },
      },
    },
  }, async () => {
    return { status: 'ok', catalogSize: services.catalog.size, timestamp: new Date().toISOString() };
  });

  await productRoutes(app, services);
  await sessionRoutes(app, services);

  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof DomainError) {
      return reply.code(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          statusCode: error.statusCode,
          ...(error.details ? { details: error.details } : {}),
        },
        timestamp: new Date().toISOString(),
      });
    }

    // Fastify validation errors
    if (error.validation) {
      return reply.code(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request validation failed',
          details: error.validation,
          statusCode: 400,
        },
        timestamp: new Date().toISOString(),
      });
    }

    app.log.error(error);

    return reply.code(500).send({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred',
        statusCode: 500,
      },
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}

async function start(): Promise<void> {
  const config = loadConfig();
  const app = await buildApp({ config });

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`API docs: http://${config.host}:${config.port}/docs`);

    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
    signals.forEach((signal) => {
      process.once(signal, () => {
        app.log.info(`${signal} received, shutting down...`);
        app.close().then(
          () => process.exit(0),
          (err: unknown) => {
            app.log.error(err, 'error during shutdown');
            process.exit(1);
          }
        );
      });
    });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

// Start if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  start().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
