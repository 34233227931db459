import { vi } from 'vitest';
import { Readable } from 'stream';
import { ConfigService } from '@nestjs/config';
import { AppConfig, buildConfiguration } from '../../../src/config/configuration';
import { PinoLoggerService } from '../../../src/shared/logging/pino-logger.service';
import { CatalogueServicePort } from '../../../src/application/ports/output/catalogue-service.port';
import { DatalinkPort } from '../../../src/application/ports/output/datalink.port';
import { JobServicePort } from '../../../src/application/ports/output/job-service.port';
import { FileStoragePort } from '../../../src/application/ports/output/file-storage.port';
import { EventPublisherPort } from '../../../src/application/ports/output/event-publisher.port';
import { CatalogueRecord } from '../../../src/domain/entities/catalogue-record.entity';
import {
  ExtractionJobEntity,
  JobSnapshot,
} from '../../../src/domain/entities/extraction-job.entity';
import { JobPhaseVO } from '../../../src/domain/value-objects/job-phase.vo';

/**
 * Mock Factories for ports and common dependencies
 * Used across adapter and use case unit tests
 */

export const TEST_VO_BASE_URL = 'https://vo.archive.test/vo/';
export const TEST_SODA_BASE_URL = 'https://data.archive.test/access/';
export const TEST_CREDENTIALS = { username: 'test-user', password: 'test-secret' };

/**
 * Configuration as loaded from a test environment
 */
export function createTestConfig(
  overrides: Record<string, string> = {},
): ConfigService<AppConfig, true> {
  return new ConfigService<AppConfig, true>(
    buildConfiguration({
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      ARCHIVE_VO_BASE_URL: TEST_VO_BASE_URL,
      ARCHIVE_SODA_BASE_URL: TEST_SODA_BASE_URL,
      ...overrides,
    }),
  );
}

/**
 * A real pino logger with output switched off
 */
export function createTestLogger(): PinoLoggerService {
  return new PinoLoggerService(
    new ConfigService<AppConfig>({ logLevel: 'silent', nodeEnv: 'test' }),
  );
}

export function createMockCatalogueService() {
  return {
    queryTap: vi.fn<CatalogueServicePort['queryTap']>(),
    querySia: vi.fn<CatalogueServicePort['querySia']>(),
  } satisfies CatalogueServicePort;
}

export function createMockDatalink() {
  return {
    resolveService: vi.fn<DatalinkPort['resolveService']>(),
  } satisfies DatalinkPort;
}

export function createMockJobService() {
  return {
    createJob: vi.fn<JobServicePort['createJob']>(),
    addParameters: vi.fn<JobServicePort['addParameters']>().mockResolvedValue(undefined),
    startJob: vi.fn<JobServicePort['startJob']>().mockResolvedValue(undefined),
    getJob: vi.fn<JobServicePort['getJob']>(),
    openResult: vi.fn<JobServicePort['openResult']>(),
  } satisfies JobServicePort;
}

export function createMockFileStorage() {
  return {
    ensureDirectory: vi.fn<FileStoragePort['ensureDirectory']>().mockResolvedValue(undefined),
    writeStream: vi.fn<FileStoragePort['writeStream']>(),
  } satisfies FileStoragePort;
}

export function createMockEventPublisher() {
  return {
    publish: vi.fn<EventPublisherPort['publish']>().mockResolvedValue(undefined),
  } satisfies EventPublisherPort;
}

export function createRecord(id: string, overrides: Partial<CatalogueRecord.CreateProps> = {}) {
  return CatalogueRecord.create({ id, ...overrides });
}

export function createJob(overrides: Partial<ExtractionJobEntity.CreateProps> = {}) {
  return ExtractionJobEntity.create({
    jobId: 'job-1',
    jobUrl: `${TEST_SODA_BASE_URL}data/async/job-1`,
    recordId: 'cube-1',
    serviceName: 'cutout_service',
    ...overrides,
  });
}

export function snapshot(
  phase: string,
  resultUrls: string[] = [],
  jobId = 'job-1',
  errorMessage?: string,
): JobSnapshot {
  return { jobId, phase: JobPhaseVO.fromString(phase), resultUrls, errorMessage };
}

/**
 * Create a readable stream from string data
 */
export function createReadableStream(data: string): Readable {
  return Readable.from([Buffer.from(data)]);
}
