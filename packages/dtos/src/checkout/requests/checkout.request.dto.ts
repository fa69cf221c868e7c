import { IsEmail, IsNotEmpty, IsString, MaxLength } from "class-validator";

export class CheckoutRequestDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(120)
  fullName!: string;

  @IsEmail()
  email!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  address!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(80)
  city!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(16)
  postalCode!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(56)
  country!: string;
}
