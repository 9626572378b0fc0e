import { Inject, Injectable, Logger } from '@nestjs/common';

import { Err, Ok, Result, errorMessage } from '../../common/result';
import { buildIncident, Incident } from '../incidents/incident.model';
import { INCIDENT_STORE, IncidentStore } from '../incidents/incident.store';

import {
  buildExtractionPrompt,
  parseExtraction,
  unwrapGeneratedText,
} from './extraction';
import { EXTRACTION_ORACLE, ExtractionOracle } from './extraction-oracle';
import type { IngestionFailure } from './ingestion.types';
import type { SmsMessage } from './sms-form';

/**
 * Turns one inbound SMS into one stored incident.
 *
 * The store write is the last step, so every failure leaves the store
 * untouched. Nothing is retried. `ingest` never throws: failures come back as
 * tagged `Err` values for the transport to map.
 */
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    @Inject(EXTRACTION_ORACLE) private readonly oracle: ExtractionOracle,
    @Inject(INCIDENT_STORE) private readonly store: IncidentStore,
  ) {}

  async ingest(
    requestId: string | null | undefined,
    sms: SmsMessage,
  ): Promise<Result<Incident, IngestionFailure>> {
    if (!requestId || requestId.trim().length === 0) {
      this.logger.warn('Rejected SMS without a request id');
      return Err({ type: 'missing_request_id' });
    }

    try {
      const envelope = await this.oracle.invoke(
        buildExtractionPrompt(sms.description),
      );
      const text = unwrapGeneratedText(envelope);
      this.logger.debug(`Model raw response for ${requestId}: ${text}`);

      const extracted = parseExtraction(text);
      if (!extracted.ok) {
        this.logger.error(
          `Error processing incident ${requestId}: ${extracted.error.message}`,
        );
        return extracted;
      }

      const incident = buildIncident({
        incident_id: requestId,
        ...extracted.value,
        source: sms.contact,
        original_message: sms.description,
      });

      await this.store.put(incident);
      this.logger.log(
        `Stored incident ${incident.incident_id} (${incident.incident_type}, ${incident.priority})`,
      );

      return Ok(incident);
    } catch (error) {
      this.logger.error(
        `Error processing incident ${requestId}: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return Err({
        type: 'infrastructure_failure',
        message: errorMessage(error),
      });
    }
  }
}
