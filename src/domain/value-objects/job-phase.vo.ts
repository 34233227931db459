/**
 * Job Phase Value Object
 * Execution phase of a UWS async job as reported by the remote service
 */
export enum JobPhase {
  PENDING = 'PENDING',
  QUEUED = 'QUEUED',
  EXECUTING = 'EXECUTING',
  COMPLETED = 'COMPLETED',
  ERROR = 'ERROR',
  ABORTED = 'ABORTED',
  HELD = 'HELD',
  SUSPENDED = 'SUSPENDED',
  ARCHIVED = 'ARCHIVED',
  UNKNOWN = 'UNKNOWN',
}

const PHASES: ReadonlySet<string> = new Set(Object.values(JobPhase));

function isJobPhase(value: string): value is JobPhase {
  return PHASES.has(value);
}

export class JobPhaseVO {
  private constructor(private readonly _value: JobPhase) {}

  /** Phases this client does not recognise are UNKNOWN, which keeps the job polled. */
  static fromString(value: string): JobPhaseVO {
    const normalizedValue = value.trim().toUpperCase();
    return new JobPhaseVO(isJobPhase(normalizedValue) ? normalizedValue : JobPhase.UNKNOWN);
  }

  static pending(): JobPhaseVO {
    return new JobPhaseVO(JobPhase.PENDING);
  }

  static queued(): JobPhaseVO {
    return new JobPhaseVO(JobPhase.QUEUED);
  }

  static executing(): JobPhaseVO {
    return new JobPhaseVO(JobPhase.EXECUTING);
  }

  static completed(): JobPhaseVO {
    return new JobPhaseVO(JobPhase.COMPLETED);
  }

  static error(): JobPhaseVO {
    return new JobPhaseVO(JobPhase.ERROR);
  }

  static aborted(): JobPhaseVO {
    return new JobPhaseVO(JobPhase.ABORTED);
  }

  get value(): JobPhase {
    return this._value;
  }

  isTerminal(): boolean {
    return this.isCompleted() || this.isFailed();
  }

  isCompleted(): boolean {
    return this._value === JobPhase.COMPLETED;
  }

  /** ARCHIVED jobs have had their results deleted. */
  isFailed(): boolean {
    return [JobPhase.ERROR, JobPhase.ABORTED, JobPhase.ARCHIVED].includes(this._value);
  }

  isActive(): boolean {
    return !this.isTerminal();
  }

  equals(other: JobPhaseVO): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
