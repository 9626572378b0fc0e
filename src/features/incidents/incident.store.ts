import type { Incident, TimestampRange } from './incident.model';

export const INCIDENT_STORE = Symbol('INCIDENT_STORE');

export interface IncidentStore {
  /** Unconditional upsert keyed by incident_id. */
  put(incident: Incident): Promise<void>;

  get(incidentId: string): Promise<Incident | null>;

  /** Newest first. */
  list(range: TimestampRange): Promise<Incident[]>;

  /** Returns the updated record, or null when the id is unknown. */
  updateStatus(incidentId: string, status: string): Promise<Incident | null>;

  /** Returns false when there was nothing to delete. */
  delete(incidentId: string): Promise<boolean>;
}
