import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsDate,
  IsInt,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

export class CreateFormTemplateDto {
  @IsString()
  @MaxLength(200)
  title!: string;

  @IsString()
  @IsOptional()
  description?: string;

  @IsInt()
  @IsOptional()
  productId?: number;

  @IsObject()
  schema!: Record<string, unknown>;

  @IsBoolean()
  @IsOptional()
  isShareable?: boolean;

  @Type(() => Date)
  @IsDate()
  @IsOptional()
  shareExpiry?: Date;

  @IsBoolean()
  @IsOptional()
  isActive?: boolean;
}
