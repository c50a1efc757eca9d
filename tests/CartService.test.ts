import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Logger } from 'pino';
import { CartService, EMPTY_CART } from '../src/domain/services/CartService.js';
import { CatalogService } from '../src/domain/services/CatalogService.js';
import { ValidationError, ResourceNotFoundError } from '../src/domain/errors/index.js';
import type { SqliteStore } from '../src/infrastructure/repositories/SqliteStore.js';
import { createTestStore, seedSampleCatalog, silentLogger, type SampleCatalog } from './fixtures/store.js';

describe('CartService', () => {
  let store: SqliteStore;
  let sample: SampleCatalog;
  let catalog: CatalogService;
  let logger: Logger;
  let cartService: CartService;

  beforeEach(() => {
    store = createTestStore();
    sample = seedSampleCatalog(store);
    catalog = new CatalogService(store.catalog);
    logger = silentLogger.child({ component: 'cart' });
    cartService = new CartService(catalog, logger);
  });

  afterEach(() => {
    store.close();
  });

  describe('add', () => {
    it('adds one unit of an active product', () => {
      const cart = cartService.add(EMPTY_CART, sample.tshirt.id);

      expect(cart).toEqual({ [String(sample.tshirt.id)]: 1 });
    });

    it('increments an existing line by one', () => {
      const once = cartService.add(EMPTY_CART, sample.tshirt.id);
      const twice = cartService.add(once, sample.tshirt.id);

      expect(twice[String(sample.tshirt.id)]).toBe(2);
      expect(cartService.totalQuantity(twice)).toBe(2);
    });

    it('leaves the input cart untouched', () => {
      const before = cartService.add(EMPTY_CART, sample.tshirt.id);
      cartService.add(before, sample.tshirt.id);

      expect(before).toEqual({ [String(sample.tshirt.id)]: 1 });
      expect(EMPTY_CART).toEqual({});
    });

    it('throws 404 for an unknown product', () => {
      expect(() => cartService.add(EMPTY_CART, 9999)).toThrow(ResourceNotFoundError);
    });

    it('throws 404 for an inactive product', () => {
      expect(() => cartService.add(EMPTY_CART, sample.retired.id)).toThrow(ResourceNotFoundError);
    });

    it('should throw ValidationError when the line would exceed the maximum', () => {
      const capped = new CartService(catalog, logger, { maxQuantity: 2 });
      const cart = capped.add(capped.add(EMPTY_CART, sample.mug.id), sample.mug.id);

      expect(() => capped.add(cart, sample.mug.id)).toThrow(ValidationError);
    });
  });

  describe('setQuantity', () => {
    it('sets the quantity exactly instead of adding', () => {
      const cart = cartService.add(cartService.add(EMPTY_CART, sample.tshirt.id), sample.tshirt.id);
      const updated = cartService.setQuantity(cart, sample.tshirt.id, 5);

      expect(updated[String(sample.tshirt.id)]).toBe(5);
    });

    it('removes the line when qty is zero', () => {
      const cart = cartService.add(cartService.add(EMPTY_CART, sample.tshirt.id), sample.mug.id);
      const updated = cartService.setQuantity(cart, sample.tshirt.id, 0);

      const productIds = Array.from(cartService.items(updated), (line) => line.product.id);
      expect(productIds).toEqual([sample.mug.id]);
      expect(String(sample.tshirt.id) in updated).toBe(false);
    });

    it('removes the line when qty is negative', () => {
      const cart = cartService.add(EMPTY_CART, sample.tshirt.id);

      expect(cartService.setQuantity(cart, sample.tshirt.id, -3)).toEqual({});
    });

    it('rejects a non-integer qty', () => {
      const cart = cartService.add(EMPTY_CART, sample.tshirt.id);

      expect(() => cartService.setQuantity(cart, sample.tshirt.id, 1.5)).toThrow(ValidationError);
    });

    it('rejects qty above the maximum', () => {
      expect(() => cartService.setQuantity(EMPTY_CART, sample.tshirt.id, 100)).toThrow(ValidationError);
    });

    it('throws 404 when setting a positive qty for an inactive product', () => {
      expect(() => cartService.setQuantity(EMPTY_CART, sample.retired.id, 1)).toThrow(
        ResourceNotFoundError
      );
    });
  });

  describe('remove', () => {
    it('removes a line', () => {
      const cart = cartService.add(EMPTY_CART, sample.hoodie.id);

      expect(cartService.remove(cart, sample.hoodie.id)).toEqual({});
    });

    it('is idempotent', () => {
      const cart = cartService.add(EMPTY_CART, sample.hoodie.id);
      const once = cartService.remove(cart, sample.hoodie.id);
      const twice = cartService.remove(once, sample.hoodie.id);

      expect(twice).toEqual({});
      expect(cartService.remove(EMPTY_CART, 42)).toBe(EMPTY_CART);
    });
  });

  describe('items and totals', () => {
    it('resolves lines with subtotals', () => {
      let cart = cartService.setQuantity(EMPTY_CART, sample.tshirt.id, 2);
      cart = cartService.add(cart, sample.mug.id);

      const lines = Array.from(cartService.items(cart), (line) => ({
        id: line.product.id,
        qty: line.qty,
        subtotal: line.subtotal,
      }));

      expect(lines).toEqual([
        { id: sample.tshirt.id, qty: 2, subtotal: 2000 },
        { id: sample.mug.id, qty: 1, subtotal: 1250 },
      ]);
      expect(cartService.totalQuantity(cart)).toBe(3);
      expect(cartService.totalAmount(cart)).toBe(3250);
    });

    it('prices lines at the current product price', () => {
      let cart = cartService.setQuantity(EMPTY_CART, sample.tshirt.id, 2);
      cart = cartService.add(cart, sample.mug.id);

      store.catalog.updateProduct(sample.tshirt.id, { price: 1500 });

      // 2 * 15.00 + 1 * 12.50
      expect(cartService.totalAmount(cart)).toBe(4250);
    });

    it('drops and logs a line whose product was deactivated', () => {
      const warn = vi.spyOn(logger, 'warn');
      let cart = cartService.add(EMPTY_CART, sample.tshirt.id);
      cart = cartService.add(cart, sample.mug.id);

      store.catalog.updateProduct(sample.mug.id, { isActive: false });
      const view = cartService.view(cart);

      expect(view.items.map((line) => line.product.id)).toEqual([sample.tshirt.id]);
      expect(view.totalQuantity).toBe(1);
      expect(view.totalAmount).toBe(1000);
      expect(warn).toHaveBeenCalledWith(
        { productId: String(sample.mug.id), qty: 1 },
        'dropping stale cart line'
      );
      // the stored cart still carries the line
      expect(String(sample.mug.id) in cart).toBe(true);
    });

    it('drops a line whose product was deleted', () => {
      const cart = cartService.add(cartService.add(EMPTY_CART, sample.hoodie.id), sample.tshirt.id);

      store.catalog.deleteProduct(sample.hoodie.id);

      expect(cartService.totalQuantity(cart)).toBe(1);
      expect(cartService.totalAmount(cart)).toBe(1000);
    });

    it('reports an empty view for an empty cart', () => {
      expect(cartService.view(EMPTY_CART)).toEqual({ items: [], totalQuantity: 0, totalAmount: 0 });
      expect(cartService.isEmpty(EMPTY_CART)).toBe(true);
    });
  });
});
