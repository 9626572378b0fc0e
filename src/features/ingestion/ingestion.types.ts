import type { Incident } from '../incidents/incident.model';

export type ExtractedFields = Pick<
  Incident,
  'incident_location' | 'incident_type' | 'priority'
>;

export type ParseFailure = { type: 'parse_failure'; message: string };

export type IngestionFailure =
  | { type: 'missing_request_id' }
  | ParseFailure
  | { type: 'infrastructure_failure'; message: string };
