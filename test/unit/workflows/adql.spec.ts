import { describe, it, expect } from 'vitest';
import {
  adqlString,
  blockChannelCubesQuery,
  blockComponentsQuery,
  blockCubesQuery,
  cubeByIdQuery,
  projectImagesNearQuery,
} from '../../../src/workflows/adql';
import { SkyPositionVO } from '../../../src/domain/value-objects/sky-position.vo';

describe('adql', () => {
  it('should double quotes inside string literals', () => {
    expect(adqlString("O'Brien")).toBe("'O''Brien'");
  });

  it('should find the cutout-capable products of a scheduling block', () => {
    expect(blockCubesQuery('1234')).toBe(
      "SELECT * FROM ivoa.obscore WHERE obs_id = '1234' AND dataproduct_type = 'cube'" +
        " AND dataproduct_subtype IN ('cont.restored.t0', 'spectral.restored.3d')",
    );
  });

  it('should find bright components of a scheduling block', () => {
    expect(blockComponentsQuery(1234, 500)).toBe(
      'SELECT * FROM casda.continuum_component WHERE first_sbid = 1234 AND flux_peak > 500',
    );
  });

  it('should find multi-channel cubes of a subtype', () => {
    expect(blockChannelCubesQuery('1234', 'spectral.restored.3d')).toBe(
      "SELECT TOP 1000 * FROM ivoa.obscore WHERE obs_id = '1234'" +
        " AND dataproduct_subtype = 'spectral.restored.3d' AND em_xel > 1",
    );
  });

  it('should find a cube by its publisher DID', () => {
    expect(cubeByIdQuery("cube-'1'")).toBe(
      "SELECT * FROM ivoa.obscore WHERE obs_publisher_did = 'cube-''1''' AND dataproduct_type = 'cube'",
    );
  });

  it('should find project images around a position', () => {
    expect(projectImagesNearQuery('VAST', SkyPositionVO.create({ ra: 10, dec: -20 }))).toBe(
      "SELECT * FROM ivoa.obscore WHERE obs_collection LIKE '%VAST%'" +
        " AND dataproduct_subtype = 'cont.restored.t0' AND pol_states = '/I/'" +
        " AND 1 = CONTAINS(POINT('ICRS', s_ra, s_dec), CIRCLE('ICRS', 10, -20, 3))",
    );
  });
});
