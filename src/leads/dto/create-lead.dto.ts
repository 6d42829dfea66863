import {
  IsEmail,
  IsIn,
  IsInt,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
  ValidateIf,
} from 'class-validator';
import type { FormPayload, LeadStatus } from '../lead.entity';

/** Statuses an agent may create a lead in. */
export const CREATABLE_STATUSES = ['draft', 'submitted'] as const;

export class CreateLeadDto {
  @IsInt()
  productId!: number;

  @IsInt()
  @IsOptional()
  formTemplateId?: number;

  @IsString()
  @MaxLength(200)
  customerName!: string;

  @ValidateIf((dto: CreateLeadDto) => Boolean(dto.customerEmail))
  @IsEmail()
  customerEmail?: string;

  @IsString()
  @MaxLength(20)
  @IsOptional()
  customerPhone?: string;

  @IsObject()
  @IsOptional()
  formData?: FormPayload;

  @IsString()
  @MaxLength(50)
  @IsOptional()
  source?: string;

  @IsString()
  @MaxLength(50)
  @IsOptional()
  referralCode?: string;

  @IsIn(CREATABLE_STATUSES)
  @IsOptional()
  status?: Extract<LeadStatus, 'draft' | 'submitted'>;
}
