import { Expose, Type } from "class-transformer";
import { ProductResponseDto } from "../../products/responses/product.response.dto";

export class CartLineResponseDto {
  @Expose()
  @Type(() => ProductResponseDto)
  product!: ProductResponseDto;

  @Expose()
  quantity!: number;

  @Expose()
  lineTotalCents!: number;
}
