import { AuthenticationError } from '../../../domain';

interface StatusResponse {
  statusCode: number;
  url: string;
}

export function isSuccess(response: StatusResponse): boolean {
  return response.statusCode >= 200 && response.statusCode < 300;
}

export function isRedirect(response: StatusResponse): boolean {
  return response.statusCode >= 300 && response.statusCode < 400;
}

/**
 * Throws AuthenticationError for 401 and 403, which end the run whatever the call was.
 */
export function assertAuthorised(response: StatusResponse): void {
  if (response.statusCode === 401 || response.statusCode === 403) {
    throw new AuthenticationError(response.url, response.statusCode);
  }
}

/** Last non-empty path segment of a URL */
export function lastPathSegment(url: string): string | undefined {
  return new URL(url).pathname.split('/').filter((segment) => segment.length > 0).pop();
}
