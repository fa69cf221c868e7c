import { Injectable } from '@nestjs/common';
import { DatabaseService, TransactionClient } from '../database/database.service';
import {
  OrderEntity,
  OrderItemEntity,
  OrderStatus,
} from '../entities/order.entity';

interface OrderRow {
  id: number;
  full_name: string;
  email: string;
  address: string;
  city: string;
  postal_code: string;
  country: string;
  total_cents: number;
  status: OrderStatus;
  created_at: Date;
}

interface OrderItemRow {
  id: number;
  order_id: number;
  product_id: number;
  product_name: string;
  unit_price_cents: number;
  quantity: number;
}

export type NewOrder = Omit<OrderEntity, 'id' | 'createdAt' | 'status' | 'items'>;
export type NewOrderItem = Omit<OrderItemEntity, 'id' | 'orderId'>;

function toItem(row: OrderItemRow): OrderItemEntity {
  return {
    id: row.id,
    orderId: row.order_id,
    productId: row.product_id,
    productName: row.product_name,
    unitPriceCents: row.unit_price_cents,
    quantity: row.quantity,
  };
}

function toEntity(row: OrderRow, items: OrderItemEntity[]): OrderEntity {
  return {
    id: row.id,
    fullName: row.full_name,
    email: row.email,
    address: row.address,
    city: row.city,
    postalCode: row.postal_code,
    country: row.country,
    totalCents: row.total_cents,
    status: row.status,
    createdAt: row.created_at,
    items,
  };
}

@Injectable()
export class OrdersRepository {
  constructor(private readonly db: DatabaseService) {}

  async findById(id: number, tx?: TransactionClient): Promise<OrderEntity | null> {
    const rows = await this.db.query<OrderRow>(
      'SELECT * FROM orders WHERE id = $1',
      [id],
      tx,
    );
    const order = rows[0];
    if (!order) {
      return null;
    }
    const items = await this.db.query<OrderItemRow>(
      'SELECT * FROM order_items WHERE order_id = $1 ORDER BY id',
      [id],
      tx,
    );
    return toEntity(order, items.map(toItem));
  }

  async createWithItems(
    data: NewOrder,
    items: NewOrderItem[],
    tx: TransactionClient,
  ): Promise<OrderEntity> {
    const [order] = await this.db.query<OrderRow>(
      `INSERT INTO orders (full_name, email, address, city, postal_code, country, total_cents)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING *`,
      [
        data.fullName,
        data.email,
        data.address,
        data.city,
        data.postalCode,
        data.country,
        data.totalCents,
      ],
      tx,
    );

    const created: OrderItemEntity[] = [];
    for (const item of items) {
      const [row] = await this.db.query<OrderItemRow>(
        `INSERT INTO order_items (order_id, product_id, product_name, unit_price_cents, quantity)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING *`,
        [
          order.id,
          item.productId,
          item.productName,
          item.unitPriceCents,
          item.quantity,
        ],
        tx,
      );
      created.push(toItem(row));
    }

    return toEntity(order, created);
  }
}
