import { BaseEntity } from './base.entity';

export interface ProductEntity extends BaseEntity {
  name: string;
  description: string;
  category: string;
  priceCents: number;
  stock: number;
  imageUrl: string | null;
}
