import { IsString, MaxLength, MinLength } from 'class-validator';

export class OrderLookupParamsDto {
  @IsString()
  @MinLength(1)
  @MaxLength(64)
  requesterId!: string;

  @IsString()
  @MinLength(1)
  @MaxLength(64)
  orderCode!: string;
}
