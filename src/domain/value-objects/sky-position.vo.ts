import { InvalidArgumentError } from '../errors/archive.errors';

/**
 * Sky Position Value Object
 * ICRS position held in decimal degrees
 */
export interface SkyPositionProps {
  ra: number;
  dec: number;
}

const SEXAGESIMAL_SEPARATORS = /[:hdms°'"\s]+/i;

function isSexagesimal(text: string): boolean {
  return /[:hdms°]/i.test(text);
}

/**
 * Parse "dd:mm:ss.s" or "12h30m00s" style text into a value in the leading
 * unit. The sign is taken from the text so that "-00:30:00" stays negative.
 */
function parseSexagesimal(text: string): number {
  const trimmed = text.trim();
  const negative = trimmed.startsWith('-');
  const parts = trimmed
    .replace(/^[+-]/, '')
    .split(SEXAGESIMAL_SEPARATORS)
    .filter((part) => part.length > 0);

  if (parts.length === 0 || parts.length > 3) {
    return Number.NaN;
  }

  const [whole, minutes = '0', seconds = '0'] = parts;
  const values = [whole, minutes, seconds].map(Number);
  if (values.some((value) => !Number.isFinite(value))) {
    return Number.NaN;
  }

  const magnitude = values[0] + values[1] / 60 + values[2] / 3600;
  return negative ? -magnitude : magnitude;
}

export class SkyPositionVO {
  private constructor(
    private readonly _ra: number,
    private readonly _dec: number,
  ) {}

  static create(props: SkyPositionProps): SkyPositionVO {
    SkyPositionVO.validate(props);
    return new SkyPositionVO(props.ra, props.dec);
  }

  /**
   * Parse an RA/Dec pair. An RA written with ':' or 'h' is in hours of
   * angle, otherwise degrees; the declination is always degrees.
   */
  static parse(raText: string, decText: string): SkyPositionVO {
    const raInHours = raText.includes(':') || /h/i.test(raText);
    const ra = raInHours ? parseSexagesimal(raText) * 15 : Number(raText);
    const dec = isSexagesimal(decText) ? parseSexagesimal(decText) : Number(decText);

    if (!Number.isFinite(ra) || !Number.isFinite(dec)) {
      throw new InvalidArgumentError(`Unable to parse sky position "${raText} ${decText}"`);
    }

    return SkyPositionVO.create({ ra, dec });
  }

  private static validate(props: SkyPositionProps): void {
    if (!Number.isFinite(props.ra) || props.ra < 0 || props.ra >= 360) {
      throw new InvalidArgumentError(`Right ascension ${props.ra} is outside [0, 360) degrees`);
    }
    if (!Number.isFinite(props.dec) || props.dec < -90 || props.dec > 90) {
      throw new InvalidArgumentError(`Declination ${props.dec} is outside [-90, 90] degrees`);
    }
  }

  get ra(): number {
    return this._ra;
  }

  get dec(): number {
    return this._dec;
  }

  /** SIA2 / SODA POS criterion, e.g. "CIRCLE 187.5 -45.2 0.1" */
  toCircle(radiusDegrees: number): string {
    if (!Number.isFinite(radiusDegrees) || radiusDegrees <= 0) {
      throw new InvalidArgumentError(`Radius must be a positive number of degrees, got ${radiusDegrees}`);
    }
    return `CIRCLE ${this._ra} ${this._dec} ${radiusDegrees}`;
  }

  equals(other: SkyPositionVO): boolean {
    return this._ra === other._ra && this._dec === other._dec;
  }

  toString(): string {
    return `${this._ra} ${this._dec}`;
  }

  toJSON() {
    return { ra: this._ra, dec: this._dec };
  }
}
