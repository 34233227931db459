import { MalformedResponseError } from '../../domain/errors/archive.errors';
import { attribute, child, childText, children, parseXml } from './xml-document';

/**
 * UWS job document (uws:job) as returned by GET on a job URL.
 */
export interface UwsJobDocument {
  jobId: string;
  phase: string;
  resultUrls: string[];
  errorMessage?: string;
}

export function parseUwsJob(xml: string): UwsJobDocument {
  const document = parseXml(xml, 'UWS job document');
  const job = child(document, 'job');
  if (!job) {
    throw new MalformedResponseError('Response is not a UWS job document');
  }

  const jobId = childText(job, 'jobId');
  const phase = childText(job, 'phase');
  if (!jobId || !phase) {
    throw new MalformedResponseError('UWS job document has no jobId or phase');
  }

  const results = child(job, 'results');
  const resultUrls = results
    ? children(results, 'result')
        .map((result) => attribute(result, 'href'))
        .filter((href): href is string => href !== undefined && href.length > 0)
    : [];

  const errorSummary = child(job, 'errorSummary');
  const errorMessage = errorSummary ? childText(errorSummary, 'message') : undefined;

  return { jobId, phase, resultUrls, errorMessage };
}
