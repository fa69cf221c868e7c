import { plainToInstance } from 'class-transformer';
import {
  cart as cartDtos,
  checkout as checkoutDtos,
  products as productDtos,
} from '@storefront/dtos';
import { ProductEntity } from '../data-access/entities/product.entity';
import { OrderEntity } from '../data-access/entities/order.entity';

interface CartLineLike {
  product: ProductEntity;
  quantity: number;
  lineTotalCents: number;
}

// Only @Expose()d fields survive: row timestamps and shipping address lines
// stay out of page payloads.
const EXPOSED_ONLY = { excludeExtraneousValues: true };

export function toProductDto(
  product: ProductEntity,
): productDtos.ProductResponseDto {
  return plainToInstance(productDtos.ProductResponseDto, product, EXPOSED_ONLY);
}

export function toProductDtos(
  products: readonly ProductEntity[],
): productDtos.ProductResponseDto[] {
  return products.map(toProductDto);
}

export function toCartLineDtos(
  lines: readonly CartLineLike[],
): cartDtos.CartLineResponseDto[] {
  return lines.map((line) =>
    plainToInstance(cartDtos.CartLineResponseDto, line, EXPOSED_ONLY),
  );
}

export function toOrderDto(order: OrderEntity): checkoutDtos.OrderResponseDto {
  return plainToInstance(checkoutDtos.OrderResponseDto, order, EXPOSED_ONLY);
}
