import { InvalidArgumentError } from '../errors/archive.errors';

/**
 * Channel Slicing Value Object
 * Splits a spectral cube of C channels into contiguous groups of G channels
 */
export interface ChannelSlicingProps {
  totalChannels: number;
  channelsPerCube: number;
}

export interface ChannelGroup {
  /** First channel, inclusive */
  readonly start: number;
  /** Last channel, exclusive */
  readonly end: number;
}

export interface WavelengthBand {
  readonly lower: number;
  readonly upper: number;
}

export const SPEED_OF_LIGHT_M_PER_S = 299_792_458;

export class ChannelSlicingVO {
  private constructor(
    private readonly _totalChannels: number,
    private readonly _channelsPerCube: number,
  ) {}

  static create(props: ChannelSlicingProps): ChannelSlicingVO {
    ChannelSlicingVO.validate(props);
    return new ChannelSlicingVO(
      props.totalChannels,
      Math.min(props.channelsPerCube, props.totalChannels),
    );
  }

  private static validate(props: ChannelSlicingProps): void {
    if (!Number.isInteger(props.totalChannels) || props.totalChannels <= 0) {
      throw new InvalidArgumentError(
        `Channel count must be a positive integer, got ${props.totalChannels}`,
      );
    }
    if (!Number.isInteger(props.channelsPerCube) || props.channelsPerCube <= 0) {
      throw new InvalidArgumentError(
        `Channels per cube must be a positive integer, got ${props.channelsPerCube}`,
      );
    }
  }

  get totalChannels(): number {
    return this._totalChannels;
  }

  get channelsPerCube(): number {
    return this._channelsPerCube;
  }

  get cubeCount(): number {
    return Math.ceil(this._totalChannels / this._channelsPerCube);
  }

  get isEvenPartition(): boolean {
    return this._totalChannels % this._channelsPerCube === 0;
  }

  groups(): ChannelGroup[] {
    return Array.from({ length: this.cubeCount }, (_, index) => ({
      start: index * this._channelsPerCube,
      end: Math.min((index + 1) * this._channelsPerCube, this._totalChannels),
    }));
  }

  /** True when emMin..emMax is a wavelength range that bands can be cut from */
  static isUsableRange(emMin: number, emMax: number): boolean {
    return emMin > 0 && emMax > emMin && Number.isFinite(emMax);
  }

  /**
   * Wavelength interval of each group, ascending and in metres. Channels are
   * evenly spaced in frequency between c/emMax and c/emMin, and a band spans
   * the centres of its first and last channel so neighbouring bands never
   * share a channel. A one-channel group spans that channel's edges instead.
   */
  toBands(emMin: number, emMax: number): WavelengthBand[] {
    if (!ChannelSlicingVO.isUsableRange(emMin, emMax)) {
      throw new InvalidArgumentError(
        `Spectral range must satisfy 0 < em_min < em_max, got ${emMin} .. ${emMax}`,
      );
    }

    const minFrequency = SPEED_OF_LIGHT_M_PER_S / emMax;
    const maxFrequency = SPEED_OF_LIGHT_M_PER_S / emMin;
    const channelWidth = (maxFrequency - minFrequency) / this._totalChannels;
    const frequencyAt = (position: number) => minFrequency + position * channelWidth;

    return this.groups().map(({ start, end }) => {
      const [low, high] = end - start === 1 ? [start, end] : [start + 0.5, end - 0.5];
      return {
        lower: SPEED_OF_LIGHT_M_PER_S / frequencyAt(high),
        upper: SPEED_OF_LIGHT_M_PER_S / frequencyAt(low),
      };
    });
  }

  /** SODA BAND parameter values, "lower upper" per group */
  toBandParameters(emMin: number, emMax: number): string[] {
    return this.toBands(emMin, emMax).map((band) => `${band.lower} ${band.upper}`);
  }

  toJSON() {
    return {
      totalChannels: this._totalChannels,
      channelsPerCube: this._channelsPerCube,
      cubeCount: this.cubeCount,
    };
  }
}
