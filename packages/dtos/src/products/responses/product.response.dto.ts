import { Expose } from "class-transformer";

export class ProductResponseDto {
  @Expose()
  id!: number;

  @Expose()
  name!: string;

  @Expose()
  description!: string;

  @Expose()
  category!: string;

  @Expose()
  priceCents!: number;

  @Expose()
  stock!: number;

  @Expose()
  imageUrl!: string | null;
}
