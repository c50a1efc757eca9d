import type { FastifyInstance } from 'fastify';
import type { CatalogQuery } from '../../domain/models.js';
import { parseSort } from '../../domain/services/CatalogService.js';
import type { AppServices } from '../context.js';
import { envelope, presentCategory, presentProduct } from '../presenters.js';

const catalogQuerySchema = {
  type: 'object',
  properties: {
    q: { type: 'string', description: 'Case-insensitive search over name and description' },
    sort: {
      type: 'string',
      description: 'price_asc | price_desc | new; anything else keeps insertion order',
    },
  },
} as const;

export function registerCatalogRoutes(app: FastifyInstance, { catalog }: AppServices): void {
  app.get('/v1/categories', {
    schema: {
      tags: ['catalog'],
      description: 'List all categories, ordered by name',
    },
  }, async (_request, reply) => {
    return reply.code(200).send(envelope(catalog.categories().map(presentCategory)));
  });

  app.get<{
    Querystring: CatalogQuery;
  }>('/v1/products', {
    schema: {
      tags: ['catalog'],
      description: 'List active products',
      querystring: catalogQuerySchema,
    },
  }, async (request, reply) => {
    const { q, sort } = request.query;
    const products = catalog.list({ searchText: q, sort: parseSort(sort) });

    return reply.code(200).send(envelope(Array.from(products, presentProduct)));
  });

  app.get<{
    Params: { slug: string };
    Querystring: CatalogQuery;
  }>('/v1/categories/:slug/products', {
    schema: {
      tags: ['catalog'],
      description: 'List active products in one category',
      params: {
        type: 'object',
        required: ['slug'],
        properties: {
          slug: { type: 'string' },
        },
      },
      querystring: catalogQuerySchema,
    },
  }, async (request, reply) => {
    const { slug } = request.params;
    const { q, sort } = request.query;
    const category = catalog.getCategory(slug);
    const products = catalog.list({ categorySlug: category.slug, searchText: q, sort: parseSort(sort) });

    return reply.code(200).send(
      envelope({
        category: presentCategory(category),
        products: Array.from(products, presentProduct),
      })
    );
  });

  app.get<{
    Params: { slug: string };
  }>('/v1/products/:slug', {
    schema: {
      tags: ['catalog'],
      description: 'Retrieve an active product by slug',
      params: {
        type: 'object',
        required: ['slug'],
        properties: {
          slug: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const product = catalog.getBySlug(request.params.slug);
    return reply.code(200).send(envelope(presentProduct(product)));
  });
}
