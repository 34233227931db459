import { Inject, Injectable, Logger } from '@nestjs/common';
import { basename, join } from 'path';
import {
  ArtifactOutcome,
  DownloadResultsCommand,
  DownloadResultsPort,
  DownloadResultsResult,
} from '../ports/input/download-results.port';
import { EVENT_PUBLISHER_PORT, FILE_STORAGE_PORT, JOB_SERVICE_PORT } from '../ports/output';
import { JobServicePort } from '../ports/output/job-service.port';
import { FileStoragePort } from '../ports/output/file-storage.port';
import { EventPublisherPort } from '../ports/output/event-publisher.port';
import { ExtractionJobEntity } from '../../domain/entities/extraction-job.entity';
import { ArtifactDownloadedEvent } from '../../domain/events/artifact-downloaded.event';
import { ArtifactFailedEvent } from '../../domain/events/artifact-failed.event';

const FALLBACK_FILE_NAME = 'result';

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Local file name for a result: the server's Content-Disposition name when it
 * sent one, otherwise the last segment of the URL path. Directory parts are
 * dropped so a name can never leave the destination directory.
 */
export function artifactFileName(url: string, dispositionName?: string): string {
  const segment = new URL(url).pathname.split('/').filter((part) => part.length > 0).pop();
  const candidate = basename(dispositionName ?? decodeSegment(segment ?? ''));
  return candidate.length > 0 && candidate !== '.' && candidate !== '..'
    ? candidate
    : FALLBACK_FILE_NAME;
}

/**
 * Download Results Use Case
 * Streams every result of a completed job into the destination directory.
 * A failed artifact is reported and skipped; there are no retries.
 */
@Injectable()
export class DownloadResultsUseCase implements DownloadResultsPort {
  private readonly logger = new Logger(DownloadResultsUseCase.name);

  constructor(
    @Inject(JOB_SERVICE_PORT)
    private readonly jobService: JobServicePort,
    @Inject(FILE_STORAGE_PORT)
    private readonly fileStorage: FileStoragePort,
    @Inject(EVENT_PUBLISHER_PORT)
    private readonly eventPublisher: EventPublisherPort,
  ) {}

  async execute(command: DownloadResultsCommand): Promise<DownloadResultsResult> {
    const { job, destinationDir } = command;

    if (!job.isCompleted()) {
      throw new Error(
        `Cannot download results of job ${job.jobId} in phase ${job.phase.value}`,
      );
    }

    const artifacts: ArtifactOutcome[] = [];
    for (const url of job.resultUrls) {
      artifacts.push(await this.downloadOne(job, url, destinationDir));
    }

    const downloadedCount = artifacts.filter((artifact) => artifact.status === 'downloaded').length;
    const failedCount = artifacts.length - downloadedCount;

    this.logger.log(
      `Job ${job.jobId}: ${downloadedCount} of ${artifacts.length} result(s) downloaded`,
    );

    return { artifacts, downloadedCount, failedCount };
  }

  private async downloadOne(
    job: ExtractionJobEntity,
    url: string,
    destinationDir: string,
  ): Promise<ArtifactOutcome> {
    try {
      const result = await this.jobService.openResult(url);
      const path = join(destinationDir, artifactFileName(url, result.fileName));

      this.logger.log(`Downloading ${url} to ${path}`);
      const sizeBytes = await this.fileStorage.writeStream(path, result.stream);

      await this.eventPublisher.publish(
        new ArtifactDownloadedEvent({ jobId: job.jobId, url, path, sizeBytes }),
      );
      return { status: 'downloaded', url, path, sizeBytes };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Unable to download ${url}: ${errorMessage}`);

      await this.eventPublisher.publish(
        new ArtifactFailedEvent({ jobId: job.jobId, url, errorMessage }),
      );
      return { status: 'failed', url, errorMessage };
    }
  }
}
