import type Database from 'better-sqlite3';
import type { CatalogSort, Category, Product } from '../../domain/models.js';
import { ConflictError, ResourceNotFoundError } from '../../domain/errors/index.js';
import { isConstraintError } from '../db/index.js';
import type {
  ICatalogRepository,
  NewCategory,
  NewProduct,
  ProductPatch,
  ProductQuery,
} from './ICatalogRepository.js';

interface CategoryRow {
  id: number;
  name: string;
  slug: string;
}

interface ProductRow {
  id: number;
  category_id: number;
  name: string;
  slug: string;
  description: string;
  price_cents: number;
  stock: number;
  is_active: number;
  created_at: string;
}

const PRODUCT_COLUMNS =
  'id, category_id, name, slug, description, price_cents, stock, is_active, created_at';

// ties always fall back to insertion order
const ORDER_BY: Record<CatalogSort, string> = {
  default: 'id ASC',
  price_asc: 'price_cents ASC, id ASC',
  price_desc: 'price_cents DESC, id ASC',
  new: 'created_at DESC, id DESC',
};

function toProduct(row: ProductRow): Product {
  return {
    id: row.id,
    categoryId: row.category_id,
    name: row.name,
    slug: row.slug,
    description: row.description,
    price: row.price_cents,
    stock: row.stock,
    isActive: row.is_active === 1,
    createdAt: new Date(row.created_at),
  };
}

export class SqliteCatalogRepository implements ICatalogRepository {
  constructor(private readonly db: Database.Database) {}

  listCategories(): Category[] {
    return this.db
      .prepare<[], CategoryRow>('SELECT id, name, slug FROM categories ORDER BY name')
      .all();
  }

  findCategoryBySlug(slug: string): Category | null {
    const row = this.db
      .prepare<[string], CategoryRow>('SELECT id, name, slug FROM categories WHERE slug = ?')
      .get(slug);
    return row ?? null;
  }

  iterateActiveProducts(query: ProductQuery): IterableIterator<Product> {
    const orderBy = ORDER_BY[query.sort];

    if (query.categoryId === undefined) {
      const rows = this.db
        .prepare<[], ProductRow>(
          `SELECT ${PRODUCT_COLUMNS} FROM products WHERE is_active = 1 ORDER BY ${orderBy}`
        )
        .iterate();
      return this.mapRows(rows);
    }

    const rows = this.db
      .prepare<[number], ProductRow>(
        `SELECT ${PRODUCT_COLUMNS} FROM products
         WHERE is_active = 1 AND category_id = ?
         ORDER BY ${orderBy}`
      )
      .iterate(query.categoryId);
    return this.mapRows(rows);
  }

  findProductById(id: number): Product | null {
    const row = this.db
      .prepare<[number], ProductRow>(`SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = ?`)
      .get(id);
    return row ? toProduct(row) : null;
  }

  findProductBySlug(slug: string): Product | null {
    const row = this.db
      .prepare<[string], ProductRow>(`SELECT ${PRODUCT_COLUMNS} FROM products WHERE slug = ?`)
      .get(slug);
    return row ? toProduct(row) : null;
  }

  createCategory(input: NewCategory): Category {
    try {
      const result = this.db
        .prepare<[string, string]>('INSERT INTO categories (name, slug) VALUES (?, ?)')
        .run(input.name, input.slug);
      return { id: Number(result.lastInsertRowid), name: input.name, slug: input.slug };
    } catch (err) {
      if (isConstraintError(err, 'UNIQUE')) {
        throw new ConflictError(`Category '${input.slug}' already exists.`);
      }
      throw err;
    }
  }

  createProduct(input: NewProduct): Product {
    const createdAt = new Date().toISOString();

    try {
      const result = this.db
        .prepare<[number, string, string, string, number, number, number, string]>(
          `INSERT INTO products
             (category_id, name, slug, description, price_cents, stock, is_active, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          input.categoryId,
          input.name,
          input.slug,
          input.description ?? '',
          input.price,
          input.stock ?? 0,
          input.isActive === false ? 0 : 1,
          createdAt
        );
      return this.getProduct(Number(result.lastInsertRowid));
    } catch (err) {
      if (isConstraintError(err, 'UNIQUE')) {
        throw new ConflictError(`Product '${input.slug}' already exists.`);
      }
      if (isConstraintError(err, 'FOREIGNKEY')) {
        throw new ResourceNotFoundError('Category', input.categoryId);
      }
      throw err;
    }
  }

  updateProduct(id: number, patch: ProductPatch): Product {
    const next = { ...this.getProduct(id), ...patch };

    this.db
      .prepare<[string, string, number, number, number, number]>(
        `UPDATE products
         SET name = ?, description = ?, price_cents = ?, stock = ?, is_active = ?
         WHERE id = ?`
      )
      .run(next.name, next.description, next.price, next.stock, next.isActive ? 1 : 0, id);

    return this.getProduct(id);
  }

  deleteProduct(id: number): void {
    try {
      const result = this.db.prepare<[number]>('DELETE FROM products WHERE id = ?').run(id);
      if (result.changes === 0) throw new ResourceNotFoundError('Product', id);
    } catch (err) {
      if (isConstraintError(err, 'FOREIGNKEY')) {
        throw new ConflictError(`Product '${id}' is referenced by existing orders and cannot be deleted.`);
      }
      throw err;
    }
  }

  deleteCategory(id: number): void {
    try {
      const result = this.db.prepare<[number]>('DELETE FROM categories WHERE id = ?').run(id);
      if (result.changes === 0) throw new ResourceNotFoundError('Category', id);
    } catch (err) {
      if (isConstraintError(err, 'FOREIGNKEY')) {
        throw new ConflictError(
          `Category '${id}' has products referenced by existing orders and cannot be deleted.`
        );
      }
      throw err;
    }
  }

  decrementStock(id: number, qty: number): void {
    this.db
      .prepare<[number, number]>('UPDATE products SET stock = MAX(0, stock - ?) WHERE id = ?')
      .run(qty, id);
  }

  private getProduct(id: number): Product {
    const product = this.findProductById(id);
    if (!product) throw new ResourceNotFoundError('Product', id);
    return product;
  }

  private *mapRows(rows: IterableIterator<ProductRow>): Generator<Product> {
    for (const row of rows) {
      yield toProduct(row);
    }
  }
}
