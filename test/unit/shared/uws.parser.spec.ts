import { describe, it, expect } from 'vitest';
import { parseUwsJob } from '../../../src/shared/votable/uws.parser';
import { uwsJob } from '../helpers/votable-fixtures';

describe('uws.parser', () => {
  it('should read job ID, phase and result hrefs', () => {
    const document = parseUwsJob(
      uwsJob('abc-123', 'COMPLETED', {
        results: ['https://data.archive.test/access/download/a.fits', 'b.fits'],
      }),
    );

    expect(document).toEqual({
      jobId: 'abc-123',
      phase: 'COMPLETED',
      resultUrls: ['https://data.archive.test/access/download/a.fits', 'b.fits'],
      errorMessage: undefined,
    });
  });

  it('should read a job with an empty results list', () => {
    expect(parseUwsJob(uwsJob('abc-123', 'QUEUED')).resultUrls).toEqual([]);
  });

  it('should read the error summary message', () => {
    const document = parseUwsJob(uwsJob('abc-123', 'ERROR', { errorMessage: 'Out of bounds' }));

    expect(document.phase).toBe('ERROR');
    expect(document.errorMessage).toBe('Out of bounds');
  });

  it('should reject documents without a job element', () => {
    expect(() => parseUwsJob('<jobs><jobref id="1"/></jobs>')).toThrow(
      'Response is not a UWS job document',
    );
  });

  it('should reject a job without a phase', () => {
    expect(() =>
      parseUwsJob('<uws:job xmlns:uws="http://www.ivoa.net/xml/UWS/v1.0"><uws:jobId>1</uws:jobId></uws:job>'),
    ).toThrow('UWS job document has no jobId or phase');
  });
});
