import { IsNotEmpty, IsString } from 'class-validator';

export class IncidentIdParamsDto {
  @IsString()
  @IsNotEmpty()
  incident_id!: string;
}
