/**
 * Archive Errors
 *
 * Fatal errors abort the whole run (the CLI exits with 1). Non-fatal ones
 * are confined to a single job or artifact and the run carries on.
 */
export enum ArchiveErrorCode {
  AUTHENTICATION_FAILED = 'AUTHENTICATION_FAILED',
  MALFORMED_RESPONSE = 'MALFORMED_RESPONSE',
  QUERY_FAILED = 'QUERY_FAILED',
  JOB_SUBMISSION_REJECTED = 'JOB_SUBMISSION_REJECTED',
  JOB_STATUS_UNAVAILABLE = 'JOB_STATUS_UNAVAILABLE',
  DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
}

export abstract class ArchiveError extends Error {
  abstract readonly code: ArchiveErrorCode;
  abstract readonly fatal: boolean;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class AuthenticationError extends ArchiveError {
  readonly code = ArchiveErrorCode.AUTHENTICATION_FAILED;
  readonly fatal = true;

  constructor(
    readonly url: string,
    readonly statusCode: number,
  ) {
    super(`Authentication rejected by ${url} (HTTP ${statusCode}); check your username and password`);
  }
}

export class MalformedResponseError extends ArchiveError {
  readonly code = ArchiveErrorCode.MALFORMED_RESPONSE;
  readonly fatal = true;

  constructor(message: string) {
    super(message);
  }
}

export class QueryFailedError extends ArchiveError {
  readonly code = ArchiveErrorCode.QUERY_FAILED;
  readonly fatal = true;

  constructor(message: string) {
    super(message);
  }
}

export class JobSubmissionError extends ArchiveError {
  readonly code = ArchiveErrorCode.JOB_SUBMISSION_REJECTED;
  readonly fatal = true;

  constructor(message: string) {
    super(message);
  }
}

/** The status of one job could not be read or understood. */
export class JobStatusError extends ArchiveError {
  readonly code = ArchiveErrorCode.JOB_STATUS_UNAVAILABLE;
  readonly fatal = false;

  constructor(
    readonly jobUrl: string,
    message: string,
  ) {
    super(message);
  }
}

export class DownloadError extends ArchiveError {
  readonly code = ArchiveErrorCode.DOWNLOAD_FAILED;
  readonly fatal = false;

  constructor(
    readonly url: string,
    message: string,
  ) {
    super(message);
  }
}

export class InvalidArgumentError extends ArchiveError {
  readonly code = ArchiveErrorCode.INVALID_ARGUMENT;
  readonly fatal = true;

  constructor(message: string) {
    super(message);
  }
}

export function isArchiveError(error: unknown): error is ArchiveError {
  return error instanceof ArchiveError;
}
