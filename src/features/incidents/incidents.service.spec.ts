import { NotFoundException } from '@nestjs/common';

import { InMemoryIncidentStore } from '../../../test/support/in-memory-incident.store';

import type { Incident } from './incident.model';
import { IncidentsService } from './incidents.service';

const incident = (overrides: Partial<Incident> = {}): Incident => ({
  incident_id: 'inc-1',
  incident_location: '5th and Main',
  incident_type: 'Fire',
  priority: 'High',
  timestamp: '2025-03-01T12:00:00.000Z',
  status: 'Open',
  source: '+15550100',
  original_message: 'Fire at 5th and Main, please hurry',
  ...overrides,
});

describe('IncidentsService', () => {
  let store: InMemoryIncidentStore;
  let service: IncidentsService;

  beforeEach(() => {
    store = new InMemoryIncidentStore();
    service = new IncidentsService(store);
  });

  describe('list', () => {
    beforeEach(async () => {
      await store.put(
        incident({ incident_id: 'a', timestamp: '2025-01-10T00:00:00.000Z' }),
      );
      await store.put(
        incident({ incident_id: 'b', timestamp: '2025-02-10T00:00:00.000Z' }),
      );
      await store.put(
        incident({ incident_id: 'c', timestamp: '2025-03-10T00:00:00.000Z' }),
      );
    });

    const ids = (incidents: Incident[]) => incidents.map((i) => i.incident_id);

    it('returns everything newest first without filters', async () => {
      expect(ids(await service.list({}))).toEqual(['c', 'b', 'a']);
    });

    it('filters from a start date', async () => {
      expect(
        ids(await service.list({ startDate: '2025-02-10T00:00:00.000Z' })),
      ).toEqual(['c', 'b']);
    });

    it('filters up to an end date', async () => {
      expect(ids(await service.list({ endDate: '2025-02-01' }))).toEqual([
        'a',
      ]);
    });

    it('filters between two dates inclusively', async () => {
      expect(
        ids(
          await service.list({
            startDate: '2025-01-10T00:00:00.000Z',
            endDate: '2025-02-10T00:00:00.000Z',
          }),
        ),
      ).toEqual(['b', 'a']);
    });
  });

  describe('get', () => {
    it('returns the stored record', async () => {
      await store.put(incident());

      await expect(service.get('inc-1')).resolves.toEqual(incident());
    });

    it('throws NotFoundException for an unknown id', async () => {
      await expect(service.get('missing')).rejects.toThrow(
        new NotFoundException("Incident with ID 'missing' not found"),
      );
    });
  });

  describe('create', () => {
    it('stores the record with defaults applied', async () => {
      const created = await service.create({
        priority: 'Low',
        source: '+15550100',
        original_message: 'Tree down on Elm St',
      });

      expect(created).toMatchObject({
        incident_location: 'Unknown',
        incident_type: 'General',
        status: 'Open',
      });
      await expect(service.get(created.incident_id)).resolves.toEqual(created);
    });

    it('keeps a supplied id', async () => {
      const created = await service.create({
        incident_id: 'inc-9',
        priority: 'Low',
        source: '+15550100',
        original_message: 'Tree down on Elm St',
      });

      expect(created.incident_id).toBe('inc-9');
      expect(store.records.has('inc-9')).toBe(true);
    });
  });

  describe('updateStatus', () => {
    it('changes only the status', async () => {
      await store.put(incident());

      const result = await service.updateStatus('inc-1', 'Resolved');

      expect(result).toEqual({
        message: 'Incident inc-1 status updated to Resolved',
        incident: incident({ status: 'Resolved' }),
      });
      await expect(service.get('inc-1')).resolves.toEqual(
        incident({ status: 'Resolved' }),
      );
    });

    it('throws NotFoundException for an unknown id', async () => {
      await expect(service.updateStatus('missing', 'Closed')).rejects.toThrow(
        NotFoundException,
      );
      expect(store.records.size).toBe(0);
    });
  });

  describe('delete', () => {
    it('removes the record', async () => {
      await store.put(incident());

      await expect(service.delete('inc-1')).resolves.toEqual({
        message: 'Incident inc-1 deleted successfully',
      });
      expect(store.records.size).toBe(0);
    });

    it('throws NotFoundException and leaves other records alone', async () => {
      await store.put(incident());

      await expect(service.delete('missing')).rejects.toThrow(
        new NotFoundException('Incident missing not found'),
      );
      await expect(service.get('inc-1')).resolves.toEqual(incident());
    });
  });
});
