import { HttpStatus } from '@nestjs/common';

import type { Result } from '../../common/result';
import type { Incident } from '../incidents/incident.model';
import type { IngestionFailure } from './ingestion.types';

export type IngestionResponseBody =
  | { message: 'Incident processed'; incident: Incident }
  | { error: 'requestId missing in event' }
  | { error: 'Failed to process incident'; message: string };

export type IngestionOutcome = {
  statusCode: number;
  body: IngestionResponseBody;
};

export const toIngestionOutcome = (
  result: Result<Incident, IngestionFailure>,
): IngestionOutcome => {
  if (result.ok)
    return {
      statusCode: HttpStatus.OK,
      body: { message: 'Incident processed', incident: result.value },
    };

  const failure = result.error;
  switch (failure.type) {
    case 'missing_request_id':
      return {
        statusCode: HttpStatus.BAD_REQUEST,
        body: { error: 'requestId missing in event' },
      };
    case 'parse_failure':
    case 'infrastructure_failure':
      return {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        body: { error: 'Failed to process incident', message: failure.message },
      };
  }
};
