import { IsInt, IsNumber, IsOptional, Max, Min } from 'class-validator';

export class CreateAgentDto {
  @IsInt()
  userId!: number;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  @Max(100)
  @IsOptional()
  commissionRate?: number;
}
