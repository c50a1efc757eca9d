import type { Logger } from 'pino';
import type { Cart, CartLine, CartView } from '../models.js';
import { ValidationError } from '../errors/index.js';
import { lineTotal } from '../money.js';
import type { CatalogService } from './CatalogService.js';

export const EMPTY_CART: Cart = {};

// cart rules over plain values: every mutation returns a new Cart
export class CartService {
  private maxQty: number;

  constructor(
    private readonly catalog: CatalogService,
    private readonly logger: Logger,
    config?: {
      maxQuantity?: number;
    }
  ) {
    this.maxQty = config?.maxQuantity ?? 99;
  }

  add(cart: Cart, productId: number): Cart {
    const product = this.catalog.getActiveById(productId);
    const key = String(product.id);
    const newQty = (cart[key] ?? 0) + 1;

    if (newQty > this.maxQty) {
      throw new ValidationError(
        `Total quantity for product '${product.name}' would exceed maximum of ${this.maxQty}`,
        ['qty']
      );
    }

    return { ...cart, [key]: newQty };
  }

  // qty <= 0 removes the line; anything else replaces the quantity outright
  setQuantity(cart: Cart, productId: number, qty: number): Cart {
    if (!Number.isInteger(qty)) {
      throw new ValidationError('Quantity must be an integer.', ['qty']);
    }
    if (qty <= 0) {
      return this.remove(cart, productId);
    }
    if (qty > this.maxQty) {
      throw new ValidationError(`Quantity must be at most ${this.maxQty}.`, ['qty']);
    }

    const product = this.catalog.getActiveById(productId);
    return { ...cart, [String(product.id)]: qty };
  }

  remove(cart: Cart, productId: number): Cart {
    const key = String(productId);
    if (!(key in cart)) return cart;
    return Object.fromEntries(Object.entries(cart).filter(([id]) => id !== key));
  }

  isEmpty(cart: Cart): boolean {
    return Object.keys(cart).length === 0;
  }

  /**
   * Resolves each line against the catalog as it is read. Lines whose product
   * was deleted or deactivated are skipped and logged; they stay in the stored
   * cart, so checkout still rejects them.
   */
  *items(cart: Cart): Generator<CartLine> {
    for (const [key, qty] of Object.entries(cart)) {
      const product = this.catalog.findActiveById(Number(key));
      if (!product) {
        this.logger.warn({ productId: key, qty }, 'dropping stale cart line');
        continue;
      }
      yield { product, qty, subtotal: lineTotal(product.price, qty) };
    }
  }

  totalQuantity(cart: Cart): number {
    let total = 0;
    for (const line of this.items(cart)) total += line.qty;
    return total;
  }

  totalAmount(cart: Cart): number {
    let total = 0;
    for (const line of this.items(cart)) total += line.subtotal;
    return total;
  }

  view(cart: Cart): CartView {
    const items = Array.from(this.items(cart));
    return {
      items,
      totalQuantity: items.reduce((sum, line) => sum + line.qty, 0),
      totalAmount: items.reduce((sum, line) => sum + line.subtotal, 0),
    };
  }
}
