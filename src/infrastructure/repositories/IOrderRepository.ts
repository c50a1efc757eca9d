import type { ContactInfo, Order, OrderItem } from '../../domain/models.js';

export interface NewOrder {
  userId: number | null;
  contact: ContactInfo;
  paid: boolean;
}

export interface NewOrderItem {
  orderId: number;
  productId: number;
  qty: number;
  price: number;
}

export interface IOrderRepository {
  createOrder(input: NewOrder): Order;
  addItem(input: NewOrderItem): OrderItem;
  findOrderById(id: number): Order | null;
  // insertion order
  findItems(orderId: number): OrderItem[];
  // newest first
  listOrdersByUser(userId: number): Order[];
}
