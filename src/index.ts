import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { loadConfig, type AppConfig } from './config.js';
import { createLogger } from './logger.js';
import { openDatabase } from './infrastructure/db/index.js';
import { loadCatalogSeed, seedCatalog } from './infrastructure/db/seedCatalog.js';
import type { IStore } from './infrastructure/repositories/IStore.js';
import { SqliteStore } from './infrastructure/repositories/SqliteStore.js';
import type { ISessionStore } from './infrastructure/session/ISessionStore.js';
import { InMemorySessionStore } from './infrastructure/session/InMemorySessionStore.js';
import type { IPasswordHasher } from './infrastructure/security/IPasswordHasher.js';
import { ScryptPasswordHasher } from './infrastructure/security/ScryptPasswordHasher.js';
import { CatalogService } from './domain/services/CatalogService.js';
import { CartService } from './domain/services/CartService.js';
import { OrderService } from './domain/services/OrderService.js';
import { AuthService } from './domain/services/AuthService.js';
import { SessionService } from './domain/services/SessionService.js';
import type { AppServices } from './api/context.js';
import { registerErrorHandlers } from './api/errorHandler.js';
import { registerCatalogRoutes } from './api/routes/catalog.js';
import { registerCartRoutes } from './api/routes/cart.js';
import { registerCheckoutRoutes } from './api/routes/checkout.js';
import { registerAuthRoutes } from './api/routes/auth.js';

export interface BuildAppOptions {
  config?: Partial<AppConfig>;
  // built from config when omitted; the app closes the store on shutdown
  store?: IStore;
  sessionStore?: ISessionStore;
  passwordHasher?: IPasswordHasher;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config: AppConfig = { ...loadConfig(), ...options.config };
  const logger = createLogger(config.logLevel);
  const loggerInstance: FastifyBaseLogger = logger;

  const app = Fastify({ loggerInstance });

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
          url: config.apiBaseUrl,
          description: config.nodeEnv === 'production' ? 'Production server' : 'Development server',
        },
      ],
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'catalog', description: 'Categories and products' },
        { name: 'session', description: 'Visitor sessions' },
        { name: 'cart', description: 'Cart management operations' },
        { name: 'checkout', description: 'Placing orders' },
        { name: 'orders', description: 'Order history' },
        { name: 'auth', description: 'Registration, login and logout' },
      ],
      components: {
        schemas: {
          Product: {
            type: 'object',
            properties: {
              id: { type: 'integer', example: 1 },
              categoryId: { type: 'integer', example: 1 },
              name: { type: 'string', example: 'Stoneware Mug' },
              slug: { type: 'string', example: 'stoneware-mug' },
              description: { type: 'string' },
              price: { type: 'string', example: '12.00' },
              stock: { type: 'integer', minimum: 0 },
              inStock: { type: 'boolean' },
              createdAt: { type: 'string', format: 'date-time' },
            },
          },
          CartLine: {
            type: 'object',
            properties: {
              product: { $ref: '#/components/schemas/Product' },
              qty: { type: 'integer', minimum: 1 },
              subtotal: { type: 'string', example: '24.00' },
            },
          },
          Cart: {
            type: 'object',
            properties: {
              items: {
                type: 'array',
                items: { $ref: '#/components/schemas/CartLine' },
              },
              totalQuantity: { type: 'integer' },
              totalAmount: { type: 'string', example: '24.00' },
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
                  fields: { type: 'array', items: { type: 'string' } },
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

  // dependency injection
  const store = options.store ?? new SqliteStore(openDatabase(config.databasePath));
  const sessionStore =
    options.sessionStore ??
    new InMemorySessionStore({ logger: logger.child({ component: 'sessions' }) });
  const passwordHasher = options.passwordHasher ?? new ScryptPasswordHasher();

  if (config.catalogSeedPath) {
    seedCatalog(store, loadCatalogSeed(config.catalogSeedPath), logger.child({ component: 'seed' }));
  }

  const catalog = new CatalogService(store.catalog);
  const services: AppServices = {
    catalog,
    carts: new CartService(catalog, logger.child({ component: 'cart' }), {
      maxQuantity: config.maxQuantity,
    }),
    orders: new OrderService(store, catalog, logger.child({ component: 'orders' })),
    auth: new AuthService(store.users, passwordHasher, logger.child({ component: 'auth' })),
    sessions: new SessionService(sessionStore, {
      sessionTtlMinutes: config.sessionTtlMinutes,
    }),
  };

  app.addHook('onClose', async () => {
    if (sessionStore instanceof InMemorySessionStore) {
      sessionStore.destroy();
    }
    store.close();
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
            timestamp: { type: 'string', format: 'date-time' },
          },
        },
      },
    },
  }, async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerCatalogRoutes(app, services);
  registerCartRoutes(app, services);
  registerCheckoutRoutes(app, services);
  registerAuthRoutes(app, services);

  registerErrorHandlers(app);

  return app;
}

async function start() {
  const config = loadConfig();
  const app = await buildApp({ config });

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Health check: http://${config.host}:${config.port}/health`);
    app.log.info(`API docs: http://${config.host}:${config.port}/docs`);

    // Handle shutdown gracefully
    const signals = ['SIGINT', 'SIGTERM'];
    signals.forEach((signal) => {
      process.on(signal, () => {
        app.log.info(`${signal} received, shutting down...`);
        app.close().then(
          () => {
            app.log.info('Server closed successfully');
            process.exit(0);
          },
          (err: unknown) => {
            app.log.error(err, 'Error during shutdown');
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
