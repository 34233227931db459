import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/configuration';
import {
  ExtractionPlan,
  QueryCatalogueCommand,
  QueryCataloguePort,
  RunExtractionPort,
  RunOutcome,
  RunSummary,
} from '../application/ports/input';
import { ArchiveCredentials } from '../application/ports/output/catalogue-service.port';
import { FILE_STORAGE_PORT } from '../application/ports/output';
import { FileStoragePort } from '../application/ports/output/file-storage.port';
import { QueryCatalogueUseCase } from '../application/use-cases/query-catalogue.use-case';
import { RunExtractionUseCase } from '../application/use-cases/run-extraction.use-case';
import { CatalogueRecord, CatalogueRow } from '../domain/entities/catalogue-record.entity';

export interface WorkflowContext {
  credentials: ArchiveCredentials;
  destinationDir: string;
}

export const EXIT_SUCCESS = 0;
export const EXIT_ABORTED = 1;
export const EXIT_PARTIAL = 2;

export function exitCodeFor(summary: RunSummary): number {
  return summary.outcome === 'partial' ? EXIT_PARTIAL : EXIT_SUCCESS;
}

export function emptySummary(): RunSummary {
  return {
    recordsFound: 0,
    jobsSubmitted: 0,
    jobsSkipped: 0,
    jobsCompleted: 0,
    jobsFailed: 0,
    artifactsDownloaded: 0,
    artifactsFailed: 0,
    outcome: 'empty',
  };
}

/** Sum of several runs, e.g. one per source */
export function combineSummaries(summaries: ReadonlyArray<RunSummary>): RunSummary {
  const total = summaries.reduce(
    (sum, summary) => ({
      recordsFound: sum.recordsFound + summary.recordsFound,
      jobsSubmitted: sum.jobsSubmitted + summary.jobsSubmitted,
      jobsSkipped: sum.jobsSkipped + summary.jobsSkipped,
      jobsCompleted: sum.jobsCompleted + summary.jobsCompleted,
      jobsFailed: sum.jobsFailed + summary.jobsFailed,
      artifactsDownloaded: sum.artifactsDownloaded + summary.artifactsDownloaded,
      artifactsFailed: sum.artifactsFailed + summary.artifactsFailed,
      outcome: sum.outcome,
    }),
    emptySummary(),
  );

  let outcome: RunOutcome = 'success';
  if (total.jobsSubmitted === 0) {
    outcome = 'empty';
  } else if (total.jobsFailed > 0 || total.artifactsFailed > 0) {
    outcome = 'partial';
  }
  return { ...total, outcome };
}

/**
 * Workflow Runner Service
 * The steps every workflow shares: prepare the destination, query, run the
 * extraction with the configured polling settings, and report the summary.
 */
@Injectable()
export class WorkflowRunnerService {
  private readonly logger = new Logger(WorkflowRunnerService.name);

  constructor(
    @Inject(QueryCatalogueUseCase)
    private readonly queryCatalogue: QueryCataloguePort,
    @Inject(RunExtractionUseCase)
    private readonly runExtraction: RunExtractionPort,
    @Inject(FILE_STORAGE_PORT)
    private readonly fileStorage: FileStoragePort,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {}

  async prepareDestination(destinationDir: string): Promise<void> {
    await this.fileStorage.ensureDirectory(destinationDir);
  }

  async findRecords(
    credentials: ArchiveCredentials,
    criteria: QueryCatalogueCommand['criteria'],
  ): Promise<CatalogueRecord[]> {
    return this.queryCatalogue.execute({ credentials, criteria });
  }

  async findRows(credentials: ArchiveCredentials, adql: string): Promise<CatalogueRow[]> {
    return this.queryCatalogue.fetchRows({ credentials, criteria: { kind: 'tap', adql } });
  }

  async extract(
    context: WorkflowContext,
    records: ReadonlyArray<CatalogueRecord>,
    planFor: (record: CatalogueRecord) => ExtractionPlan | null,
  ): Promise<RunSummary> {
    return this.runExtraction.execute({
      records,
      planFor,
      credentials: context.credentials,
      destinationDir: context.destinationDir,
      polling: this.configService.get('polling', { infer: true }),
    });
  }

  report(summary: RunSummary): void {
    const { outcome, ...counts } = summary;
    this.logger.log(
      `Run finished (${outcome}): ${counts.artifactsDownloaded} file(s) downloaded, ` +
        `${counts.jobsCompleted} of ${counts.jobsSubmitted} job(s) completed, ` +
        `${counts.jobsSkipped} skipped, ${counts.jobsFailed} failed, ` +
        `${counts.artifactsFailed} download(s) failed, ${counts.recordsFound} record(s) found`,
    );
  }
}
