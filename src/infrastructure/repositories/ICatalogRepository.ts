import type { CatalogSort, Category, Product } from '../../domain/models.js';

export interface ProductQuery {
  categoryId?: number;
  sort: CatalogSort;
}

export interface NewCategory {
  name: string;
  slug: string;
}

export interface NewProduct {
  categoryId: number;
  name: string;
  slug: string;
  description?: string;
  price: number;
  stock?: number;
  isActive?: boolean;
}

export type ProductPatch = Partial<Pick<Product, 'name' | 'description' | 'price' | 'stock' | 'isActive'>>;

export interface ICatalogRepository {
  listCategories(): Category[];
  findCategoryBySlug(slug: string): Category | null;
  // lazy: rows are read as the iterator advances
  iterateActiveProducts(query: ProductQuery): IterableIterator<Product>;
  findProductById(id: number): Product | null;
  findProductBySlug(slug: string): Product | null;
  createCategory(input: NewCategory): Category;
  createProduct(input: NewProduct): Product;
  updateProduct(id: number, patch: ProductPatch): Product;
  // fails with ConflictError while an order item references the product
  deleteProduct(id: number): void;
  // cascades to the category's products
  deleteCategory(id: number): void;
  // floors at zero
  decrementStock(id: number, qty: number): void;
}
