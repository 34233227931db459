import { produce } from 'immer';
import { JobPhaseVO } from '../value-objects/job-phase.vo';

/**
 * Extraction Job Entity - Aggregate Root
 * A SODA async job submitted for one catalogue record, tracked through its UWS phases
 *
 * Phase transitions come only from the remote service: the entity is created when the
 * job is submitted and every later state is a re-fetched snapshot applied through
 * withRemoteState. Result URLs are meaningless until the phase is COMPLETED, so the
 * resultUrls accessor stays empty before then.
 */

/**
 * Job state as read from a UWS job document
 */
export interface JobSnapshot {
  readonly jobId: string;
  readonly phase: JobPhaseVO;
  readonly resultUrls: ReadonlyArray<string>;
  readonly errorMessage?: string;
}

/**
 * Core data structure for ExtractionJobEntity
 */
export interface ExtractionJobEntityData {
  readonly jobId: string;
  readonly jobUrl: string;
  readonly recordId: string;
  readonly serviceName: string;
  readonly phase: JobPhaseVO;
  readonly reportedResultUrls: ReadonlyArray<string>;
  readonly errorMessage?: string;
  readonly pollCount: number;
  readonly submittedAt: Date;
  readonly updatedAt: Date;
}

export interface ExtractionJobEntity extends ExtractionJobEntityData {
  readonly resultUrls: ReadonlyArray<string>;

  isActive(): boolean;
  isCompleted(): boolean;
  isFailed(): boolean;
  failureMessage(): string;

  withRemoteState(snapshot: JobSnapshot): ExtractionJobEntity;

  toJSON(): ReturnType<typeof ExtractionJobEntity.toJSON>;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace ExtractionJobEntity {
  export interface CreateProps {
    jobId: string;
    jobUrl: string;
    recordId: string;
    serviceName: string;
    phase?: JobPhaseVO;
    submittedAt?: Date;
  }

  export function create(props: CreateProps): ExtractionJobEntity {
    validate(props);

    const submittedAt = props.submittedAt ?? new Date();
    const data: ExtractionJobEntityData = {
      jobId: props.jobId,
      jobUrl: props.jobUrl,
      recordId: props.recordId,
      serviceName: props.serviceName,
      phase: props.phase ?? JobPhaseVO.pending(),
      reportedResultUrls: [],
      pollCount: 0,
      submittedAt,
      updatedAt: submittedAt,
    };

    return attachMethods(data);
  }

  function attachMethods(data: ExtractionJobEntityData): ExtractionJobEntity {
    return {
      ...data,

      get resultUrls() {
        return resultUrls(data);
      },

      isActive: () => data.phase.isActive(),
      isCompleted: () => data.phase.isCompleted(),
      isFailed: () => data.phase.isFailed(),
      failureMessage: () => failureMessage(data),

      withRemoteState: (snapshot: JobSnapshot) => withRemoteState(data, snapshot),

      toJSON: () => toJSON(data),
    };
  }

  function validate(props: CreateProps): void {
    if (!props.jobId || props.jobId.trim().length === 0) {
      throw new Error('Job ID is required');
    }
    if (!props.jobUrl || props.jobUrl.trim().length === 0) {
      throw new Error('Job URL is required');
    }
    if (!props.recordId || props.recordId.trim().length === 0) {
      throw new Error('Record ID is required');
    }
    if (!props.serviceName || props.serviceName.trim().length === 0) {
      throw new Error('Service name is required');
    }
  }

  export function resultUrls(job: ExtractionJobEntityData): ReadonlyArray<string> {
    return job.phase.isCompleted() ? job.reportedResultUrls : [];
  }

  export function failureMessage(job: ExtractionJobEntityData): string {
    return job.errorMessage ?? `Job ended in phase ${job.phase.value}`;
  }

  export function withRemoteState(
    job: ExtractionJobEntityData,
    snapshot: JobSnapshot,
  ): ExtractionJobEntity {
    if (snapshot.jobId !== job.jobId) {
      throw new Error(`Status for job ${snapshot.jobId} applied to job ${job.jobId}`);
    }

    const updated = produce(job, (draft) => {
      draft.phase = snapshot.phase;
      draft.reportedResultUrls = [...snapshot.resultUrls];
      draft.errorMessage = snapshot.errorMessage;
      draft.pollCount = job.pollCount + 1;
      draft.updatedAt = new Date();
    });
    return attachMethods(updated);
  }

  export function toJSON(job: ExtractionJobEntityData) {
    return {
      jobId: job.jobId,
      jobUrl: job.jobUrl,
      recordId: job.recordId,
      serviceName: job.serviceName,
      phase: job.phase.value,
      resultUrls: [...resultUrls(job)],
      errorMessage: job.errorMessage,
      pollCount: job.pollCount,
      submittedAt: job.submittedAt.toISOString(),
      updatedAt: job.updatedAt.toISOString(),
    };
  }
}
