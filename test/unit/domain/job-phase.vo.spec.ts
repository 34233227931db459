import { describe, it, expect } from 'vitest';
import { JobPhase, JobPhaseVO } from '../../../src/domain/value-objects/job-phase.vo';

describe('JobPhaseVO', () => {
  it('should normalise case and whitespace', () => {
    expect(JobPhaseVO.fromString(' completed\n').value).toBe(JobPhase.COMPLETED);
  });

  it('should map unrecognised phases to UNKNOWN and keep them active', () => {
    const phase = JobPhaseVO.fromString('RESTARTING');

    expect(phase.value).toBe(JobPhase.UNKNOWN);
    expect(phase.isActive()).toBe(true);
  });

  it('should treat only COMPLETED as success', () => {
    for (const value of Object.values(JobPhase)) {
      expect(JobPhaseVO.fromString(value).isCompleted()).toBe(value === JobPhase.COMPLETED);
    }
  });

  it.each([JobPhase.ERROR, JobPhase.ABORTED, JobPhase.ARCHIVED])(
    'should treat %s as a failure',
    (value) => {
      const phase = JobPhaseVO.fromString(value);

      expect(phase.isFailed()).toBe(true);
      expect(phase.isTerminal()).toBe(true);
    },
  );

  it.each([
    JobPhase.PENDING,
    JobPhase.QUEUED,
    JobPhase.EXECUTING,
    JobPhase.HELD,
    JobPhase.SUSPENDED,
  ])('should keep polling a job in %s', (value) => {
    expect(JobPhaseVO.fromString(value).isActive()).toBe(true);
  });

  it('should compare by value', () => {
    expect(JobPhaseVO.queued().equals(JobPhaseVO.fromString('QUEUED'))).toBe(true);
    expect(JobPhaseVO.queued().equals(JobPhaseVO.executing())).toBe(false);
    expect(JobPhaseVO.aborted().toString()).toBe('ABORTED');
  });
});
