import type { FastifyInstance } from 'fastify';
import type { CheckoutRequest } from '../../domain/models.js';
import { AuthenticationRequiredError, EmptyCartError } from '../../domain/errors/index.js';
import { toContactInfo } from '../../domain/services/OrderService.js';
import type { AppServices } from '../context.js';
import { sessionParamsSchema } from '../context.js';
import { envelope, presentCart, presentOrder, presentOrderSummary } from '../presenters.js';

const contactFieldSchema = { type: 'string', maxLength: 500 } as const;

export function registerCheckoutRoutes(app: FastifyInstance, services: AppServices): void {
  const { auth, carts, orders, sessions } = services;

  // Prefilled contact form
  app.get<{
    Params: { sessionId: string };
  }>('/v1/sessions/:sessionId/checkout', {
    schema: {
      tags: ['checkout'],
      description: 'Checkout form prefilled from the logged-in user, with the cart',
      params: sessionParamsSchema,
    },
  }, async (request, reply) => {
    const session = await sessions.get(request.params.sessionId);
    const user = auth.findUser(sessions.requireUser(session));
    if (!user) throw new AuthenticationRequiredError();
    if (carts.isEmpty(session.cart)) throw new EmptyCartError();

    return reply.code(200).send(
      envelope({
        contact: orders.contactDefaults(user),
        cart: presentCart(carts.view(session.cart)),
      })
    );
  });

  // Place order
  app.post<{
    Params: { sessionId: string };
    Body: CheckoutRequest;
  }>('/v1/sessions/:sessionId/checkout', {
    schema: {
      tags: ['checkout'],
      description: 'Turn the cart into a paid order; the cart is emptied on success',
      params: sessionParamsSchema,
      body: {
        type: 'object',
        properties: {
          full_name: contactFieldSchema,
          email: contactFieldSchema,
          phone: { type: 'string', maxLength: 20 },
          address: { type: 'string', maxLength: 2000 },
          city: contactFieldSchema,
          state: contactFieldSchema,
          pincode: { type: 'string', maxLength: 10 },
        },
      },
    },
  }, async (request, reply) => {
    const { sessionId } = request.params;
    const contact = toContactInfo(request.body);

    const orderId = await sessions.modify(sessionId, (session) => {
      const userId = sessions.requireUser(session);
      const result = orders.checkout(userId, contact, session.cart);
      return { session: { ...session, cart: result.cart }, result: result.orderId };
    });

    return reply.code(201).send(envelope({ orderId }));
  });

  app.get<{
    Params: { sessionId: string };
  }>('/v1/sessions/:sessionId/orders', {
    schema: {
      tags: ['orders'],
      description: "The logged-in user's orders, newest first",
      params: sessionParamsSchema,
    },
  }, async (request, reply) => {
    const session = await sessions.get(request.params.sessionId);
    const userId = sessions.requireUser(session);

    return reply.code(200).send(envelope(orders.listOrders(userId).map(presentOrderSummary)));
  });

  // Order success view
  app.get<{
    Params: { sessionId: string; orderId: number };
  }>('/v1/sessions/:sessionId/orders/:orderId', {
    schema: {
      tags: ['orders'],
      description: 'One of the logged-in user\'s orders with items and total',
      params: {
        type: 'object',
        required: ['sessionId', 'orderId'],
        properties: {
          sessionId: { type: 'string', format: 'uuid' },
          orderId: { type: 'integer', minimum: 1 },
        },
      },
    },
  }, async (request, reply) => {
    const { sessionId, orderId } = request.params;
    const session = await sessions.get(sessionId);
    const userId = sessions.requireUser(session);

    return reply.code(200).send(envelope(presentOrder(orders.getOrder(orderId, userId))));
  });
}
