import { IsOptional, IsString, MaxLength } from 'class-validator';

export class SubmitLeadDto {
  @IsString()
  @MaxLength(2000)
  @IsOptional()
  notes?: string;
}
