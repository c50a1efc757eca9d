import { readFileSync } from 'node:fs';
import type { Logger } from 'pino';
import { z } from 'zod';
import { parseMoney } from '../../domain/money.js';
import type { IStore } from '../repositories/IStore.js';

const nonEmpty = z.string().trim().min(1, 'must be a non-empty string');

const productSeedSchema = z.object({
  name: nonEmpty,
  slug: nonEmpty,
  description: z.string().default(''),
  // decimal string ("12.50") or number; parseMoney checks the places
  price: z.union([z.string(), z.number()], {
    errorMap: () => ({ message: 'must be a decimal string or number' }),
  }),
  stock: z.number().int().min(0, 'must be a non-negative integer').default(0),
  isActive: z.boolean().default(true),
});

const categorySeedSchema = z.object({
  name: nonEmpty,
  slug: nonEmpty,
  products: z.array(productSeedSchema).default([]),
});

export const catalogSeedSchema = z.object({
  categories: z.array(categorySeedSchema),
});

export type ProductSeed = z.infer<typeof productSeedSchema>;
export type CategorySeed = z.infer<typeof categorySeedSchema>;
export type CatalogSeed = z.infer<typeof catalogSeedSchema>;

export function parseCatalogSeed(raw: unknown): CatalogSeed {
  const result = catalogSeedSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    throw new Error(`Catalog seed: ${problems.join('; ')}`);
  }
  return result.data;
}

export function loadCatalogSeed(path: string): CatalogSeed {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return parseCatalogSeed(raw);
}

// Inserts the seed catalog into an empty store. Returns the number of products created.
export function seedCatalog(store: IStore, seed: CatalogSeed, logger: Logger): number {
  if (store.catalog.listCategories().length > 0) {
    logger.debug('catalog already populated, skipping seed');
    return 0;
  }

  const created = store.transaction(() => {
    let count = 0;
    for (const categorySeed of seed.categories) {
      const category = store.catalog.createCategory({
        name: categorySeed.name,
        slug: categorySeed.slug,
      });

      for (const productSeed of categorySeed.products) {
        store.catalog.createProduct({
          categoryId: category.id,
          name: productSeed.name,
          slug: productSeed.slug,
          description: productSeed.description,
          price: parseMoney(productSeed.price),
          stock: productSeed.stock,
          isActive: productSeed.isActive,
        });
        count++;
      }
    }
    return count;
  });

  logger.info({ categories: seed.categories.length, products: created }, 'catalog seeded');
  return created;
}
