import { BaseEntity } from './base.entity';

export type OrderStatus = 'PLACED';

export interface OrderItemEntity {
  id: number;
  orderId: number;
  productId: number;
  productName: string;
  unitPriceCents: number;
  quantity: number;
}

export interface OrderEntity extends BaseEntity {
  fullName: string;
  email: string;
  address: string;
  city: string;
  postalCode: string;
  country: string;
  totalCents: number;
  status: OrderStatus;
  items: OrderItemEntity[];
}
