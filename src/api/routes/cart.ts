import type { FastifyInstance } from 'fastify';
import type { Session, UpdateQuantityRequest } from '../../domain/models.js';
import type { AppServices } from '../context.js';
import { sessionParamsSchema } from '../context.js';
import { envelope, presentCart, presentSession } from '../presenters.js';

const cartItemParamsSchema = {
  type: 'object',
  required: ['sessionId', 'productId'],
  properties: {
    sessionId: { type: 'string', format: 'uuid' },
    productId: { type: 'integer', minimum: 1 },
  },
} as const;

export function registerCartRoutes(app: FastifyInstance, services: AppServices): void {
  const { auth, carts, sessions } = services;

  const sessionView = (session: Session) => {
    const user = session.userId === null ? null : auth.findUser(session.userId);
    return presentSession(session, user, carts.view(session.cart));
  };

  app.post('/v1/sessions', {
    schema: {
      tags: ['session'],
      description: 'Start a visitor session with an empty cart',
    },
  }, async (_request, reply) => {
    const session = await sessions.create();
    return reply.code(201).send(envelope(sessionView(session)));
  });

  app.get<{
    Params: { sessionId: string };
  }>('/v1/sessions/:sessionId', {
    schema: {
      tags: ['session'],
      description: 'Retrieve a session with its user and cart',
      params: sessionParamsSchema,
    },
  }, async (request, reply) => {
    const session = await sessions.get(request.params.sessionId);
    return reply.code(200).send(envelope(sessionView(session)));
  });

  // === Cart Routes ===

  app.get<{
    Params: { sessionId: string };
  }>('/v1/sessions/:sessionId/cart', {
    schema: {
      tags: ['cart'],
      description: 'Cart lines resolved against the current catalog, with totals',
      params: sessionParamsSchema,
    },
  }, async (request, reply) => {
    const session = await sessions.get(request.params.sessionId);
    return reply.code(200).send(envelope(presentCart(carts.view(session.cart))));
  });

  // Add one unit
  app.post<{
    Params: { sessionId: string; productId: number };
  }>('/v1/sessions/:sessionId/cart/items/:productId', {
    schema: {
      tags: ['cart'],
      description: 'Add one unit of an active product to the cart',
      params: cartItemParamsSchema,
    },
  }, async (request, reply) => {
    const { sessionId, productId } = request.params;
    const session = await sessions.updateCart(sessionId, (cart) => carts.add(cart, productId));

    return reply.code(200).send(envelope(presentCart(carts.view(session.cart))));
  });

  // Set quantity
  app.put<{
    Params: { sessionId: string; productId: number };
    Body: UpdateQuantityRequest;
  }>('/v1/sessions/:sessionId/cart/items/:productId', {
    schema: {
      tags: ['cart'],
      description: 'Set the quantity of a cart line; zero or less removes it',
      params: cartItemParamsSchema,
      body: {
        type: 'object',
        required: ['qty'],
        properties: {
          qty: { type: 'integer' },
        },
      },
    },
  }, async (request, reply) => {
    const { sessionId, productId } = request.params;
    const { qty } = request.body;
    const session = await sessions.updateCart(sessionId, (cart) =>
      carts.setQuantity(cart, productId, qty)
    );

    return reply.code(200).send(envelope(presentCart(carts.view(session.cart))));
  });

  // Remove line
  app.delete<{
    Params: { sessionId: string; productId: number };
  }>('/v1/sessions/:sessionId/cart/items/:productId', {
    schema: {
      tags: ['cart'],
      description: 'Remove a cart line; removing an absent line is a no-op',
      params: cartItemParamsSchema,
    },
  }, async (request, reply) => {
    const { sessionId, productId } = request.params;
    const session = await sessions.updateCart(sessionId, (cart) => carts.remove(cart, productId));

    return reply.code(200).send(envelope(presentCart(carts.view(session.cart))));
  });
}
