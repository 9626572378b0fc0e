import { Module } from '@nestjs/common';
import { IncidentsController } from './incidents.controller';
import { IncidentsService } from './incidents.service';
import { IncidentsRepo } from './incidents.repo';
import { INCIDENT_STORE } from './incident.store';

@Module({
  controllers: [IncidentsController],
  providers: [
    IncidentsService,
    { provide: INCIDENT_STORE, useClass: IncidentsRepo },
  ],
  exports: [INCIDENT_STORE],
})
export class IncidentsModule {}
