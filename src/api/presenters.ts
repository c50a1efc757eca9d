import type {
  CartLine,
  CartView,
  Category,
  OrderDetail,
  OrderItem,
  OrderSummary,
  Product,
  Session,
  User,
} from '../domain/models.js';
import { formatMoney, lineTotal } from '../domain/money.js';

// JSON shapes: money goes out as two-decimal strings

export function presentCategory(category: Category) {
  return { id: category.id, name: category.name, slug: category.slug };
}

export function presentProduct(product: Product) {
  return {
    id: product.id,
    categoryId: product.categoryId,
    name: product.name,
    slug: product.slug,
    description: product.description,
    price: formatMoney(product.price),
    stock: product.stock,
    inStock: product.stock > 0,
    createdAt: product.createdAt,
  };
}

function presentCartLine(line: CartLine) {
  return {
    product: presentProduct(line.product),
    qty: line.qty,
    subtotal: formatMoney(line.subtotal),
  };
}

export function presentCart(view: CartView) {
  return {
    items: view.items.map(presentCartLine),
    totalQuantity: view.totalQuantity,
    totalAmount: formatMoney(view.totalAmount),
  };
}

export function presentUser(user: User) {
  return { id: user.id, username: user.username, email: user.email, createdAt: user.createdAt };
}

export function presentSession(session: Session, user: User | null, cart: CartView) {
  return {
    sessionId: session.sessionId,
    user: user ? presentUser(user) : null,
    cart: presentCart(cart),
    createdAt: session.createdAt,
    expiresAt: session.expiresAt,
  };
}

function presentOrderItem(item: OrderItem) {
  return {
    productId: item.productId,
    productName: item.productName,
    qty: item.qty,
    price: formatMoney(item.price),
    subtotal: formatMoney(lineTotal(item.price, item.qty)),
  };
}

function presentContact(order: OrderSummary | OrderDetail) {
  const { contact } = order;
  return {
    full_name: contact.fullName,
    email: contact.email,
    phone: contact.phone,
    address: contact.address,
    city: contact.city,
    state: contact.state,
    pincode: contact.pincode,
  };
}

export function presentOrder(order: OrderDetail) {
  return {
    id: order.id,
    contact: presentContact(order),
    paid: order.paid,
    createdAt: order.createdAt,
    items: order.items.map(presentOrderItem),
    totalAmount: formatMoney(order.totalAmount),
  };
}

export function presentOrderSummary(order: OrderSummary) {
  return {
    id: order.id,
    contact: presentContact(order),
    paid: order.paid,
    createdAt: order.createdAt,
    itemCount: order.itemCount,
    totalAmount: formatMoney(order.totalAmount),
  };
}

export function envelope<T>(data: T) {
  return { data, timestamp: new Date().toISOString() };
}
