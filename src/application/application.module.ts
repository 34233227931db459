import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';

// Use Cases
import {
  QueryCatalogueUseCase,
  SubmitExtractionJobUseCase,
  PollJobStatusUseCase,
  DownloadResultsUseCase,
  RunExtractionUseCase,
} from './use-cases';

/**
 * Application Module
 * Contains all use cases and application services
 *
 * Use cases depend on output ports (interfaces) only. The implementations
 * (adapters) are bound to the port tokens by the InfrastructureModule.
 */
@Module({
  imports: [InfrastructureModule],
  providers: [
    QueryCatalogueUseCase,
    SubmitExtractionJobUseCase,
    PollJobStatusUseCase,
    DownloadResultsUseCase,
    RunExtractionUseCase,
  ],
  exports: [
    // Export use cases so they can be used by driving adapters (workflows)
    QueryCatalogueUseCase,
    SubmitExtractionJobUseCase,
    PollJobStatusUseCase,
    DownloadResultsUseCase,
    RunExtractionUseCase,
  ],
})
export class ApplicationModule {}
