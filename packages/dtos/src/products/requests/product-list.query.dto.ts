import { IsOptional, IsString, MaxLength } from "class-validator";

export class ProductListQueryDto {
  @IsOptional()
  @IsString()
  @MaxLength(64)
  category?: string;

  @IsOptional()
  @IsString()
  @MaxLength(128)
  q?: string;
}
