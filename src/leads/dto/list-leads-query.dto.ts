import { Type } from 'class-transformer';
import {
  IsDate,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';
import { LEAD_STATUSES } from '../lead.entity';
import type { LeadStatus } from '../lead.entity';

export const LEAD_ORDERINGS = [
  'createdAt',
  '-createdAt',
  'updatedAt',
  '-updatedAt',
  'status',
  '-status',
] as const;
export type LeadOrdering = (typeof LEAD_ORDERINGS)[number];

export class ListLeadsQueryDto {
  @IsIn(LEAD_STATUSES)
  @IsOptional()
  status?: LeadStatus;

  @Type(() => Number)
  @IsInt()
  @IsOptional()
  product?: number;

  @Type(() => Number)
  @IsInt()
  @IsOptional()
  subCategory?: number;

  @Type(() => Date)
  @IsDate()
  @IsOptional()
  createdAfter?: Date;

  @Type(() => Date)
  @IsDate()
  @IsOptional()
  createdBefore?: Date;

  /** Matches reference number, customer name, phone or email. */
  @IsString()
  @IsOptional()
  search?: string;

  @IsIn(LEAD_ORDERINGS)
  @IsOptional()
  ordering?: LeadOrdering;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @IsOptional()
  page?: number;
}
