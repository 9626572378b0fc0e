import { IsNotEmpty, IsString } from 'class-validator';

export class UpdateStatusDto {
  @IsString()
  @IsNotEmpty()
  incident_id!: string;

  @IsString()
  @IsNotEmpty()
  status!: string;
}
