import { MalformedResponseError } from '../errors/archive.errors';
import { SkyPositionVO } from '../value-objects/sky-position.vo';

/**
 * Catalogue Record
 * One data product returned by a TAP or SIA query, keyed by its publisher DID
 */

/** Column name to cell text; an empty string is a null cell */
export type CatalogueRow = Readonly<Record<string, string>>;

export interface SpectralAxis {
  /** Shortest wavelength, metres */
  readonly emMin: number;
  /** Longest wavelength, metres */
  readonly emMax: number;
  readonly channels: number;
}

export interface CatalogueRecord {
  readonly id: string;
  readonly datalinkUrl?: string;
  readonly position?: SkyPositionVO;
  readonly subtype?: string;
  readonly spectralAxis?: SpectralAxis;
  readonly row: CatalogueRow;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace CatalogueRecord {
  export const ID_COLUMN = 'obs_publisher_did';

  export interface CreateProps {
    id: string;
    datalinkUrl?: string;
    position?: SkyPositionVO;
    subtype?: string;
    spectralAxis?: SpectralAxis;
    row?: CatalogueRow;
  }

  export function create(props: CreateProps): CatalogueRecord {
    if (!props.id || props.id.trim().length === 0) {
      throw new MalformedResponseError('Catalogue record has no identifier');
    }

    return Object.freeze({
      id: props.id.trim(),
      datalinkUrl: props.datalinkUrl,
      position: props.position,
      subtype: props.subtype,
      spectralAxis: props.spectralAxis,
      row: props.row ?? { [ID_COLUMN]: props.id },
    });
  }

  export function fromRow(row: CatalogueRow): CatalogueRecord {
    const id = text(row, ID_COLUMN);
    if (id === undefined) {
      throw new MalformedResponseError(`Result row has no ${ID_COLUMN} value`);
    }

    return create({
      id,
      datalinkUrl: text(row, 'access_url'),
      position: positionOf(row),
      subtype: text(row, 'dataproduct_subtype'),
      spectralAxis: spectralAxisOf(row),
      row,
    });
  }

  export function hasSubtype(record: CatalogueRecord, subtypes: readonly string[]): boolean {
    return record.subtype !== undefined && subtypes.includes(record.subtype);
  }

  function text(row: CatalogueRow, column: string): string | undefined {
    const value = row[column]?.trim();
    return value ? value : undefined;
  }

  function numeric(row: CatalogueRow, column: string): number | undefined {
    const value = text(row, column);
    if (value === undefined) {
      return undefined;
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }

  function positionOf(row: CatalogueRow): SkyPositionVO | undefined {
    const ra = numeric(row, 's_ra');
    const dec = numeric(row, 's_dec');
    if (ra === undefined || dec === undefined) {
      return undefined;
    }
    return SkyPositionVO.create({ ra, dec });
  }

  function spectralAxisOf(row: CatalogueRow): SpectralAxis | undefined {
    const emMin = numeric(row, 'em_min');
    const emMax = numeric(row, 'em_max');
    const channels = numeric(row, 'em_xel');
    if (emMin === undefined || emMax === undefined || channels === undefined) {
      return undefined;
    }
    return { emMin, emMax, channels };
  }
}
