import { Type } from 'class-transformer';
import { IsInt, IsOptional } from 'class-validator';

export class ProductQueryDto {
  @Type(() => Number)
  @IsInt()
  @IsOptional()
  subCategory?: number;

  @Type(() => Number)
  @IsInt()
  @IsOptional()
  mainCategory?: number;
}
