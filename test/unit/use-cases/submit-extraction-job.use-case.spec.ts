import { describe, it, expect, beforeEach } from 'vitest';
import { SubmitExtractionJobUseCase } from '../../../src/application/use-cases/submit-extraction-job.use-case';
import { JobSubmittedEvent } from '../../../src/domain/events/job-submitted.event';
import { JobSubmissionError } from '../../../src/domain/errors/archive.errors';
import {
  TEST_CREDENTIALS,
  createMockDatalink,
  createMockEventPublisher,
  createMockJobService,
  createRecord,
} from '../helpers/mock-factories';

const JOB_URL = 'https://data.archive.test/access/data/async/job-9';

describe('SubmitExtractionJobUseCase', () => {
  let useCase: SubmitExtractionJobUseCase;
  let datalink: ReturnType<typeof createMockDatalink>;
  let jobService: ReturnType<typeof createMockJobService>;
  let eventPublisher: ReturnType<typeof createMockEventPublisher>;

  beforeEach(() => {
    datalink = createMockDatalink();
    jobService = createMockJobService();
    eventPublisher = createMockEventPublisher();
    useCase = new SubmitExtractionJobUseCase(datalink, jobService, eventPublisher);

    datalink.resolveService.mockResolvedValue({
      serviceName: 'cutout_service',
      idToken: 'tok-1',
      accessUrl: 'https://cutouts.archive.test/async',
    });
    jobService.createJob.mockResolvedValue({ jobId: 'job-9', jobUrl: JOB_URL });
  });

  it('should create, parameterise and start the job in order', async () => {
    const result = await useCase.execute({
      record: createRecord('cube-1'),
      serviceName: 'cutout_service',
      parameters: { pos: ['CIRCLE 1 2 0.1', 'CIRCLE 3 4 0.1'], band: [] },
      credentials: TEST_CREDENTIALS,
    });

    expect(datalink.resolveService).toHaveBeenCalledWith(
      expect.objectContaining({ id: 'cube-1' }),
      'cutout_service',
      TEST_CREDENTIALS,
    );
    expect(jobService.createJob).toHaveBeenCalledWith(['tok-1'], 'https://cutouts.archive.test/async');
    expect(jobService.addParameters).toHaveBeenCalledTimes(1);
    expect(jobService.addParameters).toHaveBeenCalledWith(JOB_URL, 'pos', [
      'CIRCLE 1 2 0.1',
      'CIRCLE 3 4 0.1',
    ]);
    expect(jobService.startJob).toHaveBeenCalledWith(JOB_URL);
    expect(jobService.addParameters.mock.invocationCallOrder[0]).toBeLessThan(
      jobService.startJob.mock.invocationCallOrder[0],
    );

    expect(result.status).toBe('submitted');
    if (result.status === 'submitted') {
      expect(result.job.jobId).toBe('job-9');
      expect(result.job.recordId).toBe('cube-1');
      expect(result.job.phase.value).toBe('PENDING');
    }
  });

  it('should publish a job.submitted event', async () => {
    await useCase.execute({
      record: createRecord('cube-1'),
      serviceName: 'cutout_service',
      parameters: { pos: ['CIRCLE 1 2 0.1'] },
      credentials: TEST_CREDENTIALS,
    });

    const event = eventPublisher.publish.mock.calls[0][0];
    expect(event).toBeInstanceOf(JobSubmittedEvent);
    expect(event.eventName).toBe('job.submitted');
    expect(event.toJSON()).toMatchObject({
      payload: {
        jobId: 'job-9',
        jobUrl: JOB_URL,
        recordId: 'cube-1',
        serviceName: 'cutout_service',
        parameterCount: 1,
      },
    });
  });

  it('should skip a record that does not offer the service', async () => {
    datalink.resolveService.mockResolvedValue(null);

    const result = await useCase.execute({
      record: createRecord('cube-1'),
      serviceName: 'cutout_service',
      parameters: {},
      credentials: TEST_CREDENTIALS,
    });

    expect(result).toEqual({ status: 'skipped', reason: 'No cutout_service access for cube-1' });
    expect(jobService.createJob).not.toHaveBeenCalled();
  });

  it('should not start a job whose parameters were rejected', async () => {
    jobService.addParameters.mockRejectedValue(new JobSubmissionError('rejected'));

    await expect(
      useCase.execute({
        record: createRecord('cube-1'),
        serviceName: 'cutout_service',
        parameters: { pos: ['CIRCLE 1 2 0.1'] },
        credentials: TEST_CREDENTIALS,
      }),
    ).rejects.toBeInstanceOf(JobSubmissionError);
    expect(jobService.startJob).not.toHaveBeenCalled();
    expect(eventPublisher.publish).not.toHaveBeenCalled();
  });
});
