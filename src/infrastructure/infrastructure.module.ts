import { Module } from '@nestjs/common';
import { SharedModule } from '../shared/shared.module';
import {
  CATALOGUE_SERVICE_PORT,
  DATALINK_PORT,
  EVENT_PUBLISHER_PORT,
  FILE_STORAGE_PORT,
  JOB_SERVICE_PORT,
} from '../application/ports/output';

// Adapters (implementations)
import { TapCatalogueAdapter } from './adapters/vo/tap-catalogue.adapter';
import { VoDatalinkAdapter } from './adapters/vo/vo-datalink.adapter';
import { UwsJobServiceAdapter } from './adapters/vo/uws-job-service.adapter';
import { LocalFileStorageAdapter } from './adapters/storage/local-file-storage.adapter';
import { LogEventPublisherAdapter } from './adapters/events/log-event-publisher.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 *
 * This module:
 * 1. Imports shared infrastructure (HTTP client, logging)
 * 2. Binds each adapter to its port token
 * 3. Exports the port tokens so use cases can inject them
 */
@Module({
  imports: [SharedModule],
  providers: [
    // VO service adapters
    {
      provide: CATALOGUE_SERVICE_PORT,
      useClass: TapCatalogueAdapter,
    },
    {
      provide: DATALINK_PORT,
      useClass: VoDatalinkAdapter,
    },
    {
      provide: JOB_SERVICE_PORT,
      useClass: UwsJobServiceAdapter,
    },

    // Storage adapters
    {
      provide: FILE_STORAGE_PORT,
      useClass: LocalFileStorageAdapter,
    },

    // Event publisher adapter
    {
      provide: EVENT_PUBLISHER_PORT,
      useClass: LogEventPublisherAdapter,
    },
  ],
  exports: [
    CATALOGUE_SERVICE_PORT,
    DATALINK_PORT,
    JOB_SERVICE_PORT,
    FILE_STORAGE_PORT,
    EVENT_PUBLISHER_PORT,
  ],
})
export class InfrastructureModule {}
