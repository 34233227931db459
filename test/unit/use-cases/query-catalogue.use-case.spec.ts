import { describe, it, expect, beforeEach } from 'vitest';
import { QueryCatalogueUseCase } from '../../../src/application/use-cases/query-catalogue.use-case';
import { MalformedResponseError } from '../../../src/domain/errors/archive.errors';
import { TEST_CREDENTIALS, createMockCatalogueService } from '../helpers/mock-factories';

describe('QueryCatalogueUseCase', () => {
  let useCase: QueryCatalogueUseCase;
  let catalogueService: ReturnType<typeof createMockCatalogueService>;

  beforeEach(() => {
    catalogueService = createMockCatalogueService();
    useCase = new QueryCatalogueUseCase(catalogueService);
  });

  it('should turn TAP rows into records in service order', async () => {
    catalogueService.queryTap.mockResolvedValue([
      { obs_publisher_did: 'cube-2', dataproduct_subtype: 'spectral.restored.3d' },
      { obs_publisher_did: 'cube-1', dataproduct_subtype: 'cont.restored.t0' },
    ]);

    const records = await useCase.execute({
      credentials: TEST_CREDENTIALS,
      criteria: { kind: 'tap', adql: 'SELECT * FROM ivoa.obscore' },
    });

    expect(records.map((record) => record.id)).toEqual(['cube-2', 'cube-1']);
    expect(catalogueService.queryTap).toHaveBeenCalledWith('SELECT * FROM ivoa.obscore', TEST_CREDENTIALS);
  });

  it('should run SIA2 queries for positions', async () => {
    catalogueService.querySia.mockResolvedValue([{ obs_publisher_did: 'img-1' }]);

    const records = await useCase.execute({
      credentials: TEST_CREDENTIALS,
      criteria: { kind: 'sia', positions: ['CIRCLE 1 2 0.1'] },
    });

    expect(records).toHaveLength(1);
    expect(catalogueService.querySia).toHaveBeenCalledWith(['CIRCLE 1 2 0.1'], TEST_CREDENTIALS);
  });

  it('should not query SIA2 without positions', async () => {
    const records = await useCase.execute({
      credentials: TEST_CREDENTIALS,
      criteria: { kind: 'sia', positions: [] },
    });

    expect(records).toEqual([]);
    expect(catalogueService.querySia).not.toHaveBeenCalled();
  });

  it('should reject rows without an identifier', async () => {
    catalogueService.queryTap.mockResolvedValue([{ obs_id: '1234' }]);

    await expect(
      useCase.execute({ credentials: TEST_CREDENTIALS, criteria: { kind: 'tap', adql: 'SELECT 1' } }),
    ).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it('should return raw rows from fetchRows', async () => {
    catalogueService.queryTap.mockResolvedValue([{ component_id: 'c1', flux_peak: '600' }]);

    const rows = await useCase.fetchRows({
      credentials: TEST_CREDENTIALS,
      criteria: { kind: 'tap', adql: 'SELECT * FROM casda.continuum_component' },
    });

    expect(rows).toEqual([{ component_id: 'c1', flux_peak: '600' }]);
  });
});
