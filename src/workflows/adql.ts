import { SkyPositionVO } from '../domain/value-objects/sky-position.vo';

/**
 * ADQL query builders for the archive's ObsCore and source catalogue tables
 */

export const CUTOUT_SUBTYPES = ['cont.restored.t0', 'spectral.restored.3d'] as const;
export const SPECTRAL_CUBE_SUBTYPE = 'spectral.restored.3d';
export const CONTINUUM_IMAGE_SUBTYPE = 'cont.restored.t0';

/** Cone, in degrees, used to find survey images that may contain a position */
export const PROJECT_IMAGE_SEARCH_RADIUS = 3;

/** ADQL string literal, with embedded quotes doubled */
export function adqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function adqlList(values: ReadonlyArray<string>): string {
  return `(${values.map(adqlString).join(', ')})`;
}

/** Cubes of a scheduling block that cutouts can be taken from */
export function blockCubesQuery(sbid: string): string {
  return (
    `SELECT * FROM ivoa.obscore WHERE obs_id = ${adqlString(sbid)}` +
    ` AND dataproduct_type = 'cube' AND dataproduct_subtype IN ${adqlList(CUTOUT_SUBTYPES)}`
  );
}

/** Continuum components first detected in a scheduling block, above a peak flux (mJy/beam) */
export function blockComponentsQuery(sbid: number, minPeakFlux: number): string {
  return (
    `SELECT * FROM casda.continuum_component WHERE first_sbid = ${sbid}` +
    ` AND flux_peak > ${minPeakFlux}`
  );
}

/** Multi-channel cubes of a scheduling block with one subtype */
export function blockChannelCubesQuery(sbid: string, subtype: string): string {
  return (
    `SELECT TOP 1000 * FROM ivoa.obscore WHERE obs_id = ${adqlString(sbid)}` +
    ` AND dataproduct_subtype = ${adqlString(subtype)} AND em_xel > 1`
  );
}

/** One cube by its publisher DID */
export function cubeByIdQuery(imageId: string): string {
  return (
    `SELECT * FROM ivoa.obscore WHERE obs_publisher_did = ${adqlString(imageId)}` +
    ` AND dataproduct_type = 'cube'`
  );
}

/** Stokes I continuum images of a project whose centre lies near a position */
export function projectImagesNearQuery(project: string, position: SkyPositionVO): string {
  const pattern = adqlString(`%${project}%`);
  return (
    `SELECT * FROM ivoa.obscore WHERE obs_collection LIKE ${pattern}` +
    ` AND dataproduct_subtype = ${adqlString(CONTINUUM_IMAGE_SUBTYPE)} AND pol_states = '/I/'` +
    ` AND 1 = CONTAINS(POINT('ICRS', s_ra, s_dec),` +
    ` CIRCLE('ICRS', ${position.ra}, ${position.dec}, ${PROJECT_IMAGE_SEARCH_RADIUS}))`
  );
}
