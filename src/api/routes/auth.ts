import type { FastifyInstance } from 'fastify';
import type { LoginRequest, RegisterRequest } from '../../domain/models.js';
import type { AppServices } from '../context.js';
import { sessionParamsSchema } from '../context.js';
import { envelope, presentSession, presentUser } from '../presenters.js';

export function registerAuthRoutes(app: FastifyInstance, services: AppServices): void {
  const { auth, carts, sessions } = services;

  app.post<{
    Body: RegisterRequest;
  }>('/v1/auth/register', {
    schema: {
      tags: ['auth'],
      description: 'Create a customer account',
      body: {
        type: 'object',
        required: ['username', 'email', 'password', 'confirm_password'],
        properties: {
          username: { type: 'string', maxLength: 150 },
          email: { type: 'string', maxLength: 254 },
          password: { type: 'string' },
          confirm_password: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const user = await auth.register(request.body);
    return reply.code(201).send(envelope(presentUser(user)));
  });

  app.post<{
    Params: { sessionId: string };
    Body: LoginRequest;
  }>('/v1/sessions/:sessionId/login', {
    schema: {
      tags: ['auth'],
      description:
        'Log in with a username or email; the cart moves to a new session id returned here',
      params: sessionParamsSchema,
      body: {
        type: 'object',
        required: ['username', 'password'],
        properties: {
          username: { type: 'string', description: 'Username or email' },
          password: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const { sessionId } = request.params;
    const { username, password } = request.body;

    const user = await auth.login(username, password);
    const session = await sessions.login(sessionId, user.id);

    return reply.code(200).send(envelope(presentSession(session, user, carts.view(session.cart))));
  });

  // Logout drops the whole session, cart included
  app.post<{
    Params: { sessionId: string };
  }>('/v1/sessions/:sessionId/logout', {
    schema: {
      tags: ['auth'],
      description: 'End the session',
      params: sessionParamsSchema,
    },
  }, async (request, reply) => {
    await sessions.destroy(request.params.sessionId);
    return reply.code(204).send();
  });
}
