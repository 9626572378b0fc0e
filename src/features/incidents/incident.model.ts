import crypto from 'node:crypto';

export type Incident = {
  incident_id: string;
  incident_location: string;
  incident_type: string;
  priority: string;
  timestamp: string; // ISO-8601, UTC
  status: string;
  source: string;
  original_message: string;
};

export const INCIDENT_DEFAULTS = {
  incident_location: 'Unknown',
  incident_type: 'General',
  priority: 'Medium',
  status: 'Open',
} as const;

export type IncidentInput = Partial<
  Pick<
    Incident,
    'incident_id' | 'incident_location' | 'incident_type' | 'timestamp' | 'status'
  >
> &
  Pick<Incident, 'priority' | 'source' | 'original_message'>;

/**
 * Applies creation defaults once; stored records are always complete.
 * Blank identifiers and timestamps count as absent.
 */
export const buildIncident = (
  input: IncidentInput,
  now: Date = new Date(),
): Incident => ({
  incident_id: input.incident_id || crypto.randomUUID(),
  incident_location:
    input.incident_location ?? INCIDENT_DEFAULTS.incident_location,
  incident_type: input.incident_type ?? INCIDENT_DEFAULTS.incident_type,
  priority: input.priority,
  timestamp: input.timestamp || now.toISOString(),
  status: input.status ?? INCIDENT_DEFAULTS.status,
  source: input.source,
  original_message: input.original_message,
});

export type TimestampRange = {
  start?: string;
  end?: string;
};
