import { Body, Controller, Post, Req, Res } from '@nestjs/common';
import type { Request, Response } from 'express';

import { findRequestId } from '../../common/http/request-id';

import { SmsWebhookDto } from './dto/sms-webhook.dto';
import { SMS_ROUTE } from './sms-form';
import { toIngestionOutcome } from './ingestion.outcome';
import { IngestionService } from './ingestion.service';

@Controller()
export class SmsController {
  constructor(private readonly service: IngestionService) {}

  @Post(SMS_ROUTE.path)
  async receive(
    @Body() body: SmsWebhookDto,
    @Req() req: Request,
    @Res() res: Response,
  ) {
    const result = await this.service.ingest(findRequestId(req), {
      description: body.Body ?? '',
      contact: body.From ?? '',
    });

    const outcome = toIngestionOutcome(result);
    res.status(outcome.statusCode).json(outcome.body);
  }
}
