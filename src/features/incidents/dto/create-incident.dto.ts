import { IsOptional, IsString } from 'class-validator';

export class CreateIncidentDto {
  /** Generated when omitted. */
  @IsOptional()
  @IsString()
  incident_id?: string;

  @IsOptional()
  @IsString()
  incident_location?: string;

  @IsOptional()
  @IsString()
  incident_type?: string;

  /** High, Medium or Low by convention; not enforced. */
  @IsString()
  priority!: string;

  /** ISO-8601; set to the creation time when omitted. */
  @IsOptional()
  @IsString()
  timestamp?: string;

  @IsOptional()
  @IsString()
  status?: string;

  @IsString()
  source!: string;

  @IsString()
  original_message!: string;
}
