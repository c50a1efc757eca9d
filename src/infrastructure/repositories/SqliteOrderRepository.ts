import type Database from 'better-sqlite3';
import type { Order, OrderItem } from '../../domain/models.js';
import { ResourceNotFoundError } from '../../domain/errors/index.js';
import type { IOrderRepository, NewOrder, NewOrderItem } from './IOrderRepository.js';

interface OrderRow {
  id: number;
  user_id: number | null;
  full_name: string;
  email: string;
  phone: string;
  address: string;
  city: string;
  state: string;
  pincode: string;
  created_at: string;
  paid: number;
}

interface OrderItemRow {
  id: number;
  order_id: number;
  product_id: number;
  product_name: string;
  qty: number;
  price_cents: number;
}

const ORDER_COLUMNS =
  'id, user_id, full_name, email, phone, address, city, state, pincode, created_at, paid';

function toOrder(row: OrderRow): Order {
  return {
    id: row.id,
    userId: row.user_id,
    contact: {
      fullName: row.full_name,
      email: row.email,
      phone: row.phone,
      address: row.address,
      city: row.city,
      state: row.state,
      pincode: row.pincode,
    },
    createdAt: new Date(row.created_at),
    paid: row.paid === 1,
  };
}

function toOrderItem(row: OrderItemRow): OrderItem {
  return {
    id: row.id,
    orderId: row.order_id,
    productId: row.product_id,
    productName: row.product_name,
    qty: row.qty,
    price: row.price_cents,
  };
}

export class SqliteOrderRepository implements IOrderRepository {
  constructor(private readonly db: Database.Database) {}

  createOrder(input: NewOrder): Order {
    const { contact } = input;
    const result = this.db
      .prepare<
        [number | null, string, string, string, string, string, string, string, string, number]
      >(
        `INSERT INTO orders
           (user_id, full_name, email, phone, address, city, state, pincode, created_at, paid)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        input.userId,
        contact.fullName,
        contact.email,
        contact.phone,
        contact.address,
        contact.city,
        contact.state,
        contact.pincode,
        new Date().toISOString(),
        input.paid ? 1 : 0
      );

    const order = this.findOrderById(Number(result.lastInsertRowid));
    if (!order) throw new ResourceNotFoundError('Order', Number(result.lastInsertRowid));
    return order;
  }

  addItem(input: NewOrderItem): OrderItem {
    const result = this.db
      .prepare<[number, number, number, number]>(
        'INSERT INTO order_items (order_id, product_id, qty, price_cents) VALUES (?, ?, ?, ?)'
      )
      .run(input.orderId, input.productId, input.qty, input.price);

    const row = this.db
      .prepare<[number], OrderItemRow>(
        `SELECT oi.id, oi.order_id, oi.product_id, p.name AS product_name, oi.qty, oi.price_cents
         FROM order_items oi
         JOIN products p ON p.id = oi.product_id
         WHERE oi.id = ?`
      )
      .get(Number(result.lastInsertRowid));
    if (!row) throw new ResourceNotFoundError('OrderItem', Number(result.lastInsertRowid));
    return toOrderItem(row);
  }

  findOrderById(id: number): Order | null {
    const row = this.db
      .prepare<[number], OrderRow>(`SELECT ${ORDER_COLUMNS} FROM orders WHERE id = ?`)
      .get(id);
    return row ? toOrder(row) : null;
  }

  findItems(orderId: number): OrderItem[] {
    return this.db
      .prepare<[number], OrderItemRow>(
        `SELECT oi.id, oi.order_id, oi.product_id, p.name AS product_name, oi.qty, oi.price_cents
         FROM order_items oi
         JOIN products p ON p.id = oi.product_id
         WHERE oi.order_id = ?
         ORDER BY oi.id`
      )
      .all(orderId)
      .map(toOrderItem);
  }

  listOrdersByUser(userId: number): Order[] {
    return this.db
      .prepare<[number], OrderRow>(
        `SELECT ${ORDER_COLUMNS} FROM orders WHERE user_id = ? ORDER BY created_at DESC, id DESC`
      )
      .all(userId)
      .map(toOrder);
  }
}
