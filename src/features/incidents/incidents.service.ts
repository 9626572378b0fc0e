import { Inject, Injectable, NotFoundException } from '@nestjs/common';

import { buildIncident, Incident, IncidentInput } from './incident.model';
import { INCIDENT_STORE, IncidentStore } from './incident.store';

@Injectable()
export class IncidentsService {
  constructor(@Inject(INCIDENT_STORE) private readonly store: IncidentStore) {}

  async list(input: { startDate?: string; endDate?: string }) {
    return this.store.list({ start: input.startDate, end: input.endDate });
  }

  async get(incidentId: string): Promise<Incident> {
    const incident = await this.store.get(incidentId);
    if (!incident)
      throw new NotFoundException(`Incident with ID '${incidentId}' not found`);

    return incident;
  }

  async create(input: IncidentInput): Promise<Incident> {
    const incident = buildIncident(input);
    await this.store.put(incident);
    return incident;
  }

  async updateStatus(incidentId: string, status: string) {
    const incident = await this.store.updateStatus(incidentId, status);
    if (!incident)
      throw new NotFoundException(`Incident with ID '${incidentId}' not found`);

    return {
      message: `Incident ${incidentId} status updated to ${status}`,
      incident,
    };
  }

  async delete(incidentId: string) {
    const deleted = await this.store.delete(incidentId);
    if (!deleted) throw new NotFoundException(`Incident ${incidentId} not found`);

    return { message: `Incident ${incidentId} deleted successfully` };
  }
}
