import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import configuration from './config/configuration';
import { DatabaseModule } from './database/database.module';
import { IncidentsModule } from './features/incidents/incidents.module';
import { IngestionModule } from './features/ingestion/ingestion.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [configuration] }),
    DatabaseModule,
    IncidentsModule,
    IngestionModule,
  ],
})
export class AppModule {}
