import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';

import type { AppConfig } from '../../config/configuration';
import type { Incident, TimestampRange } from './incident.model';
import type { IncidentStore } from './incident.store';

type IncidentRow = Incident;

const COLUMNS = `
  incident_id,
  incident_location,
  incident_type,
  priority,
  "timestamp",
  status,
  source,
  original_message
`;

@Injectable()
export class IncidentsRepo implements IncidentStore {
  private readonly table: string;

  constructor(
    private readonly dataSource: DataSource,
    config: ConfigService<AppConfig, true>,
  ) {
    this.table = dataSource.driver.escape(
      config.get('database.tableName', { infer: true }),
    );
  }

  async put(incident: Incident): Promise<void> {
    const sql = `
      INSERT INTO ${this.table} (${COLUMNS})
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
      ON CONFLICT (incident_id) DO UPDATE SET
        incident_location = EXCLUDED.incident_location,
        incident_type = EXCLUDED.incident_type,
        priority = EXCLUDED.priority,
        "timestamp" = EXCLUDED."timestamp",
        status = EXCLUDED.status,
        source = EXCLUDED.source,
        original_message = EXCLUDED.original_message;
    `;

    await this.dataSource.query(sql, [
      incident.incident_id,
      incident.incident_location,
      incident.incident_type,
      incident.priority,
      incident.timestamp,
      incident.status,
      incident.source,
      incident.original_message,
    ]);
  }

  async get(incidentId: string): Promise<Incident | null> {
    const rows = await this.dataSource.query<IncidentRow[]>(
      `SELECT ${COLUMNS} FROM ${this.table} WHERE incident_id = $1 LIMIT 1;`,
      [incidentId],
    );

    return rows[0] ?? null;
  }

  async list(range: TimestampRange): Promise<Incident[]> {
    const conditions: string[] = [];
    const params: string[] = [];

    if (range.start !== undefined) {
      params.push(range.start);
      conditions.push(`"timestamp" >= $${params.length}`);
    }
    if (range.end !== undefined) {
      params.push(range.end);
      conditions.push(`"timestamp" <= $${params.length}`);
    }

    const where =
      conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const sql = `
      SELECT ${COLUMNS}
      FROM ${this.table}
      ${where}
      ORDER BY "timestamp" DESC;
    `;

    return this.dataSource.query<IncidentRow[]>(sql, params);
  }

  async updateStatus(
    incidentId: string,
    status: string,
  ): Promise<Incident | null> {
    // CTE keeps the driver result a plain row list
    const sql = `
      WITH updated AS (
        UPDATE ${this.table}
        SET status = $2
        WHERE incident_id = $1
        RETURNING ${COLUMNS}
      )
      SELECT * FROM updated;
    `;

    const rows = await this.dataSource.query<IncidentRow[]>(sql, [
      incidentId,
      status,
    ]);

    return rows[0] ?? null;
  }

  async delete(incidentId: string): Promise<boolean> {
    const sql = `
      WITH deleted AS (
        DELETE FROM ${this.table}
        WHERE incident_id = $1
        RETURNING incident_id
      )
      SELECT incident_id FROM deleted;
    `;

    const rows = await this.dataSource.query<Array<{ incident_id: string }>>(
      sql,
      [incidentId],
    );

    return rows.length > 0;
  }
}
