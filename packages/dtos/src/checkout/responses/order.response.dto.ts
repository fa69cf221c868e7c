import { Expose, Type } from "class-transformer";

export class OrderItemResponseDto {
  @Expose()
  productId!: number;

  @Expose()
  productName!: string;

  @Expose()
  unitPriceCents!: number;

  @Expose()
  quantity!: number;
}

export class OrderResponseDto {
  @Expose()
  id!: number;

  @Expose()
  fullName!: string;

  @Expose()
  email!: string;

  @Expose()
  city!: string;

  @Expose()
  country!: string;

  @Expose()
  totalCents!: number;

  @Expose()
  status!: string;

  @Expose()
  createdAt!: Date;

  @Expose()
  @Type(() => OrderItemResponseDto)
  items!: OrderItemResponseDto[];
}
