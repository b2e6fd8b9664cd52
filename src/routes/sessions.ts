import type { FastifyInstance } from 'fastify';
import type { Services } from '../container.js';
import type {
  AddItemRequest,
  DeliveryInfoRequest,
  SelectPaymentRequest,
  SubmitOutcome,
} from '../domain/models.js';

type CustomerParams = { customerId: string };

const customerParams = {
  type: 'object',
  required: ['customerId'],
  properties: {
    customerId: { type: 'string', minLength: 3, maxLength: 64 },
  },
} as const;

// 201 when an order went out, 200 when the cart changed and went back to review
function submitStatus(outcome: SubmitOutcome): number {
  return outcome.status === 'submitted' ? 201 : 200;
}

export async function sessionRoutes(app: FastifyInstance, services: Services): Promise<void> {
  const { sessions, checkout } = services;

  app.post<{
    Params: CustomerParams;
  }>('/v1/sessions/:customerId', {
    schema: {
      tags: ['sessions'],
      description:
        'Open the customer session for an incoming message: continues an active cart, reopens an order submitted within the continuation window, or starts a new one',
      params: customerParams,
    },
  }, async (request, reply) => {
    const opened = await sessions.openSession(request.params.customerId);

    return reply.code(opened.outcome === 'created' || opened.outcome === 'expired_as_new_order' ? 201 : 200).send({
      data: opened,
      timestamp: new Date().toISOString(),
    });
  });

  app.get<{
    Params: CustomerParams;
  }>('/v1/sessions/:customerId', {
    schema: {
      tags: ['sessions'],
      description: 'Current session state without touching it',
      params: customerParams,
    },
  }, async (request, reply) => {
    const session = await sessions.getSession(request.params.customerId);

    return reply.code(200).send({
      data: session,
      timestamp: new Date().toISOString(),
    });
  });

  app.post<{
    Params: CustomerParams;
    Body: AddItemRequest;
  }>('/v1/sessions/:customerId/items', {
    schema: {
      tags: ['sessions'],
      description: 'Add a catalog product to the cart at its live price (merges with an existing line of the same product and unit)',
      params: customerParams,
      body: {
        type: 'object',
        required: ['productId', 'quantity'],
        properties: {
          productId: { type: 'string', pattern: '^[0-9]{8,14}$' },
          quantity: { type: 'number', exclusiveMinimum: 0 },
          unit: { type: 'string', enum: ['unit', 'kg'] },
          note: { type: 'string', maxLength: 280 },
        },
      },
    },
  }, async (request, reply) => {
    const session = await sessions.addItem(request.params.customerId, request.body);

    return reply.code(200).send({
      data: session,
      timestamp: new Date().toISOString(),
    });
  });

  app.delete<{
    Params: CustomerParams & { lineId: string };
  }>('/v1/sessions/:customerId/items/:lineId', {
    schema: {
      tags: ['sessions'],
      description: 'Remove a line from the cart',
      params: {
        type: 'object',
        required: ['customerId', 'lineId'],
        properties: {
          ...customerParams.properties,
          lineId: { type: 'string', format: 'uuid' },
        },
      },
    },
  }, async (request, reply) => {
    const { customerId, lineId } = request.params;
    const session = await sessions.removeItem(customerId, lineId);

    return reply.code(200).send({
      data: session,
      timestamp: new Date().toISOString(),
    });
  });

  app.delete<{
    Params: CustomerParams;
  }>('/v1/sessions/:customerId/items', {
    schema: {
      tags: ['sessions'],
      description: 'Empty the cart, keeping the session',
      params: customerParams,
    },
  }, async (request, reply) => {
    const session = await sessions.clearCart(request.params.customerId);

    return reply.code(200).send({
      data: session,
      timestamp: new Date().toISOString(),
    });
  });

  app.post<{
    Params: CustomerParams;
  }>('/v1/sessions/:customerId/summary', {
    schema: {
      tags: ['sessions'],
      description: 'Move the cart into review and list it with totals and payment class',
      params: customerParams,
    },
  }, async (request, reply) => {
    const summary = await sessions.getSummary(request.params.customerId);

    return reply.code(200).send({
      data: summary,
      timestamp: new Date().toISOString(),
    });
  });

  app.post<{
    Params: CustomerParams;
  }>('/v1/sessions/:customerId/edit', {
    schema: {
      tags: ['sessions'],
      description: 'Go back to editing the cart from any checkout step',
      params: customerParams,
    },
  }, async (request, reply) => {
    const session = await sessions.resumeEditing(request.params.customerId);

    return reply.code(200).send({
      data: session,
      timestamp: new Date().toISOString(),
    });
  });

  app.put<{
    Params: CustomerParams;
    Body: DeliveryInfoRequest;
  }>('/v1/sessions/:customerId/delivery', {
    schema: {
      tags: ['checkout'],
      description: 'Set recipient, address and neighborhood; the neighborhood fixes the delivery fee',
      params: customerParams,
      body: {
        type: 'object',
        properties: {
          recipientName: { type: 'string', maxLength: 120 },
          address: { type: 'string', maxLength: 240 },
          neighborhood: { type: 'string', maxLength: 120 },
        },
      },
    },
  }, async (request, reply) => {
    const session = await checkout.setDeliveryInfo(request.params.customerId, request.body ?? {});

    return reply.code(200).send({
      data: session,
      timestamp: new Date().toISOString(),
    });
  });

  app.get<{
    Params: CustomerParams;
  }>('/v1/sessions/:customerId/payment-options', {
    schema: {
      tags: ['checkout'],
      description: 'Payment methods offered for the current cart',
      params: customerParams,
    },
  }, async (request, reply) => {
    const options = await checkout.paymentOptions(request.params.customerId);

    return reply.code(200).send({
      data: options,
      timestamp: new Date().toISOString(),
    });
  });

  app.post<{
    Params: CustomerParams;
    Body: SelectPaymentRequest;
  }>('/v1/sessions/:customerId/payment', {
    schema: {
      tags: ['checkout'],
      description: 'Choose how to pay; PIX prepayment is refused for carts with items sold by weight',
      params: customerParams,
      body: {
        type: 'object',
        required: ['method'],
        properties: {
          method: { type: 'string', enum: ['pix', 'cash', 'card'] },
          timing: { type: 'string', enum: ['prepaid', 'on_delivery'] },
        },
      },
    },
  }, async (request, reply) => {
    const session = await checkout.selectPayment(request.params.customerId, request.body);

    return reply.code(200).send({
      data: session,
      timestamp: new Date().toISOString(),
    });
  });

  app.post<{
    Params: CustomerParams;
    Body: { proofRef: string };
  }>('/v1/sessions/:customerId/payment/confirmation', {
    schema: {
      tags: ['checkout'],
      description: 'Register the PIX transfer proof and submit the order',
      params: customerParams,
      body: {
        type: 'object',
        required: ['proofRef'],
        properties: {
          proofRef: { type: 'string', minLength: 1, maxLength: 200 },
        },
      },
    },
  }, async (request, reply) => {
    const outcome = await checkout.confirmPayment(request.params.customerId, request.body.proofRef);

    return reply.code(submitStatus(outcome)).send({
      data: outcome,
      timestamp: new Date().toISOString(),
    });
  });

  app.post<{
    Params: CustomerParams;
  }>('/v1/sessions/:customerId/submit', {
    schema: {
      tags: ['checkout'],
      description: 'Re-check prices and stock, then hand the order to order intake',
      params: customerParams,
    },
  }, async (request, reply) => {
    const outcome = await checkout.submit(request.params.customerId);

    return reply.code(submitStatus(outcome)).send({
      data: outcome,
      timestamp: new Date().toISOString(),
    });
  });

  app.delete<{
    Params: CustomerParams;
  }>('/v1/sessions/:customerId', {
    schema: {
      tags: ['sessions'],
      description: 'Cancel the session; the next message starts a new order',
      params: customerParams,
    },
  }, async (request, reply) => {
    const session = await sessions.cancel(request.params.customerId);

    return reply.code(200).send({
      data: session,
      timestamp: new Date().toISOString(),
    });
  });
}
