import { fileURLToPath } from 'node:url';

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;
  // ':memory:' keeps everything in process
  databasePath: string;
  // null disables seeding
  catalogSeedPath: string | null;
  sessionTtlMinutes: number;
  maxQuantity: number;
  corsOrigin: string[] | true;
  apiBaseUrl: string;
  apiTitle: string;
  apiVersion: string;
  apiDescription: string;
}

const DEFAULT_SEED_PATH = fileURLToPath(new URL('../data/catalog.json', import.meta.url));

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = readInt(env, 'PORT', 3000, 0);
  const host = env.HOST || '0.0.0.0';
  const seedPath = env.CATALOG_SEED_PATH;

  return {
    port,
    host,
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',
    databasePath: env.DATABASE_PATH || './data/storefront.sqlite',
    catalogSeedPath: seedPath === undefined ? DEFAULT_SEED_PATH : seedPath || null,
    sessionTtlMinutes: readInt(env, 'SESSION_TTL_MINUTES', 30, 1),
    maxQuantity: readInt(env, 'MAX_QUANTITY', 99, 1),
    corsOrigin: env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : true,
    apiBaseUrl: env.API_BASE_URL || `http://${host}:${port}`,
    apiTitle: env.API_TITLE || 'Storefront API',
    apiVersion: env.API_VERSION || '1.0.0',
    apiDescription:
      env.API_DESCRIPTION || 'Catalog browsing, session carts, checkout and customer accounts',
  };
}
