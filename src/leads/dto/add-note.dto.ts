import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class AddNoteDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  note!: string;
}
