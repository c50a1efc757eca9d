import type { AuthService } from '../domain/services/AuthService.js';
import type { CartService } from '../domain/services/CartService.js';
import type { CatalogService } from '../domain/services/CatalogService.js';
import type { OrderService } from '../domain/services/OrderService.js';
import type { SessionService } from '../domain/services/SessionService.js';

export interface AppServices {
  catalog: CatalogService;
  carts: CartService;
  orders: OrderService;
  auth: AuthService;
  sessions: SessionService;
}

export const sessionParamsSchema = {
  type: 'object',
  required: ['sessionId'],
  properties: {
    sessionId: { type: 'string', format: 'uuid' },
  },
} as const;
