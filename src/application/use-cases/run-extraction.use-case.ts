import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  RunExtractionCommand,
  RunExtractionPort,
  RunOutcome,
  RunSummary,
} from '../ports/input/run-extraction.port';
import { SubmitExtractionJobPort } from '../ports/input/submit-extraction-job.port';
import { PollJobStatusPort } from '../ports/input/poll-job-status.port';
import { DownloadResultsPort } from '../ports/input/download-results.port';
import { SubmitExtractionJobUseCase } from './submit-extraction-job.use-case';
import { PollJobStatusUseCase } from './poll-job-status.use-case';
import { DownloadResultsUseCase } from './download-results.use-case';
import { CatalogueRecord } from '../../domain/entities/catalogue-record.entity';

type Counters = Omit<RunSummary, 'outcome'>;

/**
 * Run Extraction Use Case
 * Drives submit, poll and download for each record in turn. A failed job only
 * ends that record's processing; fatal archive errors end the run.
 */
@Injectable()
export class RunExtractionUseCase implements RunExtractionPort {
  private readonly logger = new Logger(RunExtractionUseCase.name);

  constructor(
    @Inject(SubmitExtractionJobUseCase)
    private readonly submitJob: SubmitExtractionJobPort,
    @Inject(PollJobStatusUseCase)
    private readonly pollJob: PollJobStatusPort,
    @Inject(DownloadResultsUseCase)
    private readonly downloadResults: DownloadResultsPort,
  ) {}

  async execute(command: RunExtractionCommand): Promise<RunSummary> {
    const counters: Counters = {
      recordsFound: command.records.length,
      jobsSubmitted: 0,
      jobsSkipped: 0,
      jobsCompleted: 0,
      jobsFailed: 0,
      artifactsDownloaded: 0,
      artifactsFailed: 0,
    };

    if (command.records.length === 0) {
      this.logger.log('No matching data products, nothing to extract');
    }

    for (const [index, record] of command.records.entries()) {
      this.logger.log(`Record ${index + 1} of ${command.records.length}: ${record.id}`);
      await this.processRecord(record, command, counters);
    }

    return { ...counters, outcome: outcomeOf(counters) };
  }

  private async processRecord(
    record: CatalogueRecord,
    command: RunExtractionCommand,
    counters: Counters,
  ): Promise<void> {
    const plan = command.planFor(record);
    if (!plan) {
      this.logger.debug(`Nothing to extract from ${record.id}`);
      counters.jobsSkipped++;
      return;
    }

    const submission = await this.submitJob.execute({
      record,
      serviceName: plan.serviceName,
      parameters: plan.parameters,
      credentials: command.credentials,
    });

    if (submission.status === 'skipped') {
      counters.jobsSkipped++;
      return;
    }
    counters.jobsSubmitted++;

    const polled = await this.pollJob.execute({ job: submission.job, polling: command.polling });
    if (polled.outcome === 'failed') {
      counters.jobsFailed++;
      return;
    }
    counters.jobsCompleted++;

    const downloads = await this.downloadResults.execute({
      job: polled.job,
      destinationDir: command.destinationDir,
    });
    counters.artifactsDownloaded += downloads.downloadedCount;
    counters.artifactsFailed += downloads.failedCount;
  }
}

function outcomeOf(counters: Counters): RunOutcome {
  if (counters.jobsSubmitted === 0) {
    return 'empty';
  }
  return counters.jobsFailed > 0 || counters.artifactsFailed > 0 ? 'partial' : 'success';
}
