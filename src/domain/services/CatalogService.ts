import type { CatalogFilter, CatalogSort, Category, Product } from '../models.js';
import type { ICatalogRepository } from '../../infrastructure/repositories/ICatalogRepository.js';
import { ResourceNotFoundError } from '../errors/index.js';

const SORTS: ReadonlySet<string> = new Set<CatalogSort>(['price_asc', 'price_desc', 'new', 'default']);

function isCatalogSort(value: string): value is CatalogSort {
  return SORTS.has(value);
}

// unknown values fall back to insertion order
export function parseSort(raw: string | undefined): CatalogSort {
  return raw !== undefined && isCatalogSort(raw) ? raw : 'default';
}

function matches(product: Product, needle: string): boolean {
  return (
    product.name.toLowerCase().includes(needle) ||
    product.description.toLowerCase().includes(needle)
  );
}

// read-only views over categories and active products
export class CatalogService {
  constructor(private readonly catalog: ICatalogRepository) {}

  categories(): Category[] {
    return this.catalog.listCategories();
  }

  getCategory(slug: string): Category {
    const category = this.catalog.findCategoryBySlug(slug);
    if (!category) throw new ResourceNotFoundError('Category', slug);
    return category;
  }

  /**
   * Active products, lazily. The category is resolved up front so an unknown
   * slug fails here rather than on first iteration. Search text matches name
   * or description, case-insensitively.
   */
  list(filter: CatalogFilter = {}): Generator<Product> {
    const categoryId = filter.categorySlug ? this.getCategory(filter.categorySlug).id : undefined;
    const needle = filter.searchText?.trim().toLowerCase() ?? '';

    return this.filterProducts(
      this.catalog.iterateActiveProducts({ categoryId, sort: filter.sort ?? 'default' }),
      needle
    );
  }

  getBySlug(slug: string): Product {
    const product = this.catalog.findProductBySlug(slug);
    if (!product || !product.isActive) throw new ResourceNotFoundError('Product', slug);
    return product;
  }

  findActiveById(id: number): Product | null {
    if (!Number.isInteger(id) || id < 1) return null;
    const product = this.catalog.findProductById(id);
    return product && product.isActive ? product : null;
  }

  getActiveById(id: number): Product {
    const product = this.findActiveById(id);
    if (!product) throw new ResourceNotFoundError('Product', id);
    return product;
  }

  private *filterProducts(products: Iterable<Product>, needle: string): Generator<Product> {
    for (const product of products) {
      if (needle && !matches(product, needle)) continue;
      yield product;
    }
  }
}
