import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';

import type { AppConfig } from '../../config/configuration';
import { IncidentsModule } from '../incidents/incidents.module';

import { EXTRACTION_ORACLE } from './extraction-oracle';
import { IngestionService } from './ingestion.service';
import { OpenAiExtractionOracle } from './openai-extraction.oracle';
import { SmsController } from './sms.controller';

@Module({
  imports: [IncidentsModule],
  controllers: [SmsController],
  providers: [
    IngestionService,
    {
      provide: EXTRACTION_ORACLE,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) =>
        new OpenAiExtractionOracle(
          new OpenAI({
            apiKey: config.get('extraction.apiKey', { infer: true }),
            maxRetries: 0,
          }),
          config.get('extraction.model', { infer: true }),
        ),
    },
  ],
  exports: [IngestionService],
})
export class IngestionModule {}
