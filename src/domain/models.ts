// Money amounts are integer minor units (cents); see money.ts

export interface Category {
  id: number;
  name: string;
  slug: string;
}

export interface Product {
  id: number;
  categoryId: number;
  name: string;
  slug: string;
  description: string;
  price: number;
  stock: number;
  isActive: boolean;
  createdAt: Date;
}

// productId (string form) -> quantity, always >= 1
export type Cart = Readonly<Record<string, number>>;

export interface CartLine {
  product: Product;
  qty: number;
  subtotal: number;
}

export interface CartView {
  items: CartLine[];
  totalQuantity: number;
  totalAmount: number;
}

export type CatalogSort = 'price_asc' | 'price_desc' | 'new' | 'default';

export interface CatalogFilter {
  categorySlug?: string;
  searchText?: string;
  sort?: CatalogSort;
}

export interface ContactInfo {
  fullName: string;
  email: string;
  phone: string;
  address: string;
  city: string;
  state: string;
  pincode: string;
}

export interface Order {
  id: number;
  userId: number | null;
  contact: ContactInfo;
  createdAt: Date;
  paid: boolean;
}

export interface OrderItem {
  id: number;
  orderId: number;
  productId: number;
  productName: string;
  qty: number;
  price: number; // snapshot taken at checkout
}

export interface OrderDetail extends Order {
  items: OrderItem[];
  totalAmount: number;
}

export interface OrderSummary extends Order {
  itemCount: number;
  totalAmount: number;
}

export interface User {
  id: number;
  username: string;
  email: string;
  createdAt: Date;
}

export interface UserCredentials extends User {
  passwordHash: string;
}

export interface Session {
  sessionId: string;
  cart: Cart;
  userId: number | null;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date;
}

// === Request bodies (form field names as posted) ===

export interface UpdateQuantityRequest {
  qty: number;
}

export interface CheckoutRequest {
  full_name?: string;
  email?: string;
  phone?: string;
  address?: string;
  city?: string;
  state?: string;
  pincode?: string;
}

export interface RegisterRequest {
  username: string;
  email: string;
  password: string;
  confirm_password: string;
}

export interface LoginRequest {
  username: string;
  password: string;
}

export interface CatalogQuery {
  q?: string;
  sort?: string;
}
