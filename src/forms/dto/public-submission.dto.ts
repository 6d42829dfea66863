import {
  IsEmail,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
  ValidateIf,
} from 'class-validator';
import type { FormPayload } from '../../leads/lead.entity';

/**
 * Anonymous submission. Contact fields may be left out when the form
 * itself collects them.
 */
export class PublicSubmissionDto {
  @IsString()
  @MaxLength(200)
  @IsOptional()
  customerName?: string;

  @ValidateIf((dto: PublicSubmissionDto) => Boolean(dto.customerEmail))
  @IsEmail()
  customerEmail?: string;

  @IsString()
  @MaxLength(20)
  @IsOptional()
  customerPhone?: string;

  @IsObject()
  formData!: FormPayload;
}
