import { IsInt } from 'class-validator';

export class AssignLeadDto {
  @IsInt()
  userId!: number;
}
