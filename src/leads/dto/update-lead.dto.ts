import {
  IsEmail,
  IsIn,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
  ValidateIf,
} from 'class-validator';
import { LEAD_STATUSES } from '../lead.entity';
import type { FormPayload, LeadStatus } from '../lead.entity';

/** Product is fixed at creation and deliberately absent here. */
export class UpdateLeadDto {
  @IsString()
  @MaxLength(200)
  @IsOptional()
  customerName?: string;

  @ValidateIf((dto: UpdateLeadDto) => Boolean(dto.customerEmail))
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

  @IsIn(LEAD_STATUSES)
  @IsOptional()
  status?: LeadStatus;
}
