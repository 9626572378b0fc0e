import { Transform } from 'class-transformer';
import { IsOptional, IsString } from 'class-validator';

import { firstFormValue } from '../sms-form';

/**
 * Twilio-style inbound message form. Other Twilio fields are dropped.
 * Repeated or bracketed fields never fail validation.
 */
export class SmsWebhookDto {
  @IsOptional()
  @Transform(({ value }) => firstFormValue(value))
  @IsString()
  Body?: string;

  @IsOptional()
  @Transform(({ value }) => firstFormValue(value))
  @IsString()
  From?: string;
}
