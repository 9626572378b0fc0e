import { IsISO8601, IsOptional } from 'class-validator';

export class ListIncidentsDto {
  /** Inclusive lower bound on the incident timestamp. */
  @IsOptional()
  @IsISO8601()
  start_date?: string;

  /** Inclusive upper bound on the incident timestamp. */
  @IsOptional()
  @IsISO8601()
  end_date?: string;
}
