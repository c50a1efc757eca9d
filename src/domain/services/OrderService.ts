import type { Logger } from 'pino';
import type {
  Cart,
  CheckoutRequest,
  ContactInfo,
  OrderDetail,
  OrderItem,
  OrderSummary,
  User,
} from '../models.js';
import type { IStore } from '../../infrastructure/repositories/IStore.js';
import { EmptyCartError, ResourceNotFoundError, ValidationError } from '../errors/index.js';
import { lineTotal } from '../money.js';
import type { CatalogService } from './CatalogService.js';
import { EMPTY_CART } from './CartService.js';

const EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

// contact field -> form field it is posted as
const CONTACT_FIELDS = {
  fullName: 'full_name',
  email: 'email',
  phone: 'phone',
  address: 'address',
  city: 'city',
  state: 'state',
  pincode: 'pincode',
} as const satisfies Record<keyof ContactInfo, keyof CheckoutRequest>;

const CONTACT_KEYS: readonly (keyof ContactInfo)[] = [
  'fullName',
  'email',
  'phone',
  'address',
  'city',
  'state',
  'pincode',
];

export interface CheckoutResult {
  orderId: number;
  cart: Cart;
}

export function orderTotal(items: OrderItem[]): number {
  return items.reduce((sum, item) => sum + lineTotal(item.price, item.qty), 0);
}

export function toContactInfo(body: CheckoutRequest): ContactInfo {
  return {
    fullName: body.full_name ?? '',
    email: body.email ?? '',
    phone: body.phone ?? '',
    address: body.address ?? '',
    city: body.city ?? '',
    state: body.state ?? '',
    pincode: body.pincode ?? '',
  };
}

export class OrderService {
  constructor(
    private readonly store: IStore,
    private readonly catalog: CatalogService,
    private readonly logger: Logger
  ) {}

  /**
   * Turns the cart into a paid order. The order row, its items and the stock
   * decrements commit together; a product that vanished since it was added
   * rolls everything back.
   */
  checkout(userId: number | null, contact: ContactInfo, cart: Cart): CheckoutResult {
    const lines = Object.entries(cart);
    if (lines.length === 0) throw new EmptyCartError();

    const details = this.validateContactInfo(contact);

    for (const [productId, qty] of lines) {
      if (!Number.isInteger(qty) || qty < 1) {
        throw new ValidationError(`Invalid quantity ${qty} for product '${productId}'.`, ['qty']);
      }
    }

    const order = this.store.transaction(() => {
      const created = this.store.orders.createOrder({ userId, contact: details, paid: true });

      for (const [productId, qty] of lines) {
        // price snapshot is taken now, not when the line was added
        const product = this.catalog.getActiveById(Number(productId));
        this.store.orders.addItem({
          orderId: created.id,
          productId: product.id,
          qty,
          price: product.price,
        });
        this.store.catalog.decrementStock(product.id, qty);
      }

      return created;
    });

    this.logger.info({ orderId: order.id, userId, lines: lines.length }, 'order placed');
    return { orderId: order.id, cart: EMPTY_CART };
  }

  // trims every field; fails listing each blank one by its form name
  validateContactInfo(contact: ContactInfo): ContactInfo {
    const trimmed: ContactInfo = { ...contact };
    const missing: string[] = [];

    for (const key of CONTACT_KEYS) {
      trimmed[key] = contact[key].trim();
      if (trimmed[key] === '') missing.push(CONTACT_FIELDS[key]);
    }

    if (missing.length > 0) {
      throw new ValidationError(`Missing required fields: ${missing.join(', ')}`, missing);
    }
    if (!EMAIL_RE.test(trimmed.email)) {
      throw new ValidationError('Enter a valid email address.', [CONTACT_FIELDS.email]);
    }

    return trimmed;
  }

  getOrder(orderId: number, userId: number): OrderDetail {
    const order = this.store.orders.findOrderById(orderId);
    // someone else's order reads as missing
    if (!order || order.userId !== userId) throw new ResourceNotFoundError('Order', orderId);

    const items = this.store.orders.findItems(order.id);
    return { ...order, items, totalAmount: orderTotal(items) };
  }

  listOrders(userId: number): OrderSummary[] {
    return this.store.orders.listOrdersByUser(userId).map((order) => {
      const items = this.store.orders.findItems(order.id);
      return {
        ...order,
        itemCount: items.reduce((sum, item) => sum + item.qty, 0),
        totalAmount: orderTotal(items),
      };
    });
  }

  // checkout form prefill
  contactDefaults(user: User): CheckoutRequest {
    return {
      full_name: '',
      email: user.email,
      phone: '',
      address: '',
      city: '',
      state: '',
      pincode: '',
    };
  }
}
