import { Readable } from 'stream';
import { JobSnapshot } from '../../../domain/entities/extraction-job.entity';

export interface CreatedJob {
  jobId: string;
  jobUrl: string;
}

export interface ResultStream {
  stream: Readable;
  /** File name from Content-Disposition, when the server sent one */
  fileName?: string;
  contentLength?: number;
}

/**
 * Job Service Port (Driven Port)
 * SODA async jobs driven through the UWS job lifecycle
 */
export interface JobServicePort {
  /**
   * Create a job for the given ID tokens at the service endpoint, or at the
   * archive's default SODA async endpoint when none is given. The job starts out PENDING.
   */
  createJob(idTokens: string[], asyncUrl?: string): Promise<CreatedJob>;

  /**
   * Add one parameter key with all its values to a PENDING job
   */
  addParameters(jobUrl: string, key: string, values: string[]): Promise<void>;

  /**
   * Move the job to the run queue (PHASE=RUN)
   */
  startJob(jobUrl: string): Promise<void>;

  /**
   * Read the job's current state
   */
  getJob(jobUrl: string): Promise<JobSnapshot>;

  /**
   * Open a result for download. Throws DownloadError on a network failure or
   * an unsuccessful status.
   */
  openResult(url: string): Promise<ResultStream>;
}
