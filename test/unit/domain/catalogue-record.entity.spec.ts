import { describe, it, expect } from 'vitest';
import { CatalogueRecord } from '../../../src/domain/entities/catalogue-record.entity';
import { MalformedResponseError } from '../../../src/domain/errors/archive.errors';

describe('CatalogueRecord', () => {
  const row = {
    obs_publisher_did: 'cube-1',
    access_url: 'https://vo.archive.test/vo/datalink/links?ID=cube-1',
    s_ra: '187.5',
    s_dec: '-45.2',
    dataproduct_subtype: 'spectral.restored.3d',
    em_min: '0.2',
    em_max: '0.21',
    em_xel: '1024',
  };

  describe('fromRow', () => {
    it('should read identifier, DataLink URL, position and spectral axis', () => {
      const record = CatalogueRecord.fromRow(row);

      expect(record.id).toBe('cube-1');
      expect(record.datalinkUrl).toBe('https://vo.archive.test/vo/datalink/links?ID=cube-1');
      expect(record.position?.toJSON()).toEqual({ ra: 187.5, dec: -45.2 });
      expect(record.subtype).toBe('spectral.restored.3d');
      expect(record.spectralAxis).toEqual({ emMin: 0.2, emMax: 0.21, channels: 1024 });
      expect(record.row).toBe(row);
    });

    it('should treat empty cells as absent', () => {
      const record = CatalogueRecord.fromRow({
        obs_publisher_did: 'image-1',
        access_url: '',
        s_ra: '',
        s_dec: '12',
        em_xel: 'n/a',
      });

      expect(record.datalinkUrl).toBeUndefined();
      expect(record.position).toBeUndefined();
      expect(record.spectralAxis).toBeUndefined();
    });

    it('should reject a row without an identifier', () => {
      expect(() => CatalogueRecord.fromRow({ obs_publisher_did: ' ' })).toThrow(
        MalformedResponseError,
      );
      expect(() => CatalogueRecord.fromRow({ obs_id: '1' })).toThrow(
        'Result row has no obs_publisher_did value',
      );
    });
  });

  it('should match subtypes', () => {
    const record = CatalogueRecord.fromRow(row);

    expect(CatalogueRecord.hasSubtype(record, ['spectral.restored.3d'])).toBe(true);
    expect(CatalogueRecord.hasSubtype(record, ['cont.restored.t0'])).toBe(false);
    expect(CatalogueRecord.hasSubtype(CatalogueRecord.create({ id: 'x' }), ['x'])).toBe(false);
  });
});
