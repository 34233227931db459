import { describe, it, expect } from 'vitest';
import {
  CutoutsOptionsSchema,
  ImagesOptionsSchema,
  SliceOptionsSchema,
  SpectraOptionsSchema,
  validateOptions,
} from '../../../src/workflows/dto/workflow-options.dto';
import { InvalidArgumentError } from '../../../src/domain/errors/archive.errors';

describe('workflow options', () => {
  it('should coerce command-line strings and apply defaults', () => {
    expect(validateOptions(CutoutsOptionsSchema, { sbid: '1234' })).toEqual({
      sbid: 1234,
      fullFiles: false,
      radius: 0.1,
      minFlux: 500,
    });
    expect(validateOptions(SpectraOptionsSchema, { sourceFile: 'sources.txt' })).toEqual({
      sourceFile: 'sources.txt',
      radius: 1,
    });
    expect(validateOptions(SliceOptionsSchema, { sbid: '9', numChannels: '512' })).toEqual({
      sbid: 9,
      numChannels: 512,
      type: 'spectral.restored.3d',
    });
  });

  it('should report every invalid argument at once', () => {
    expect(() => validateOptions(SliceOptionsSchema, { sbid: 'abc', numChannels: '0' })).toThrow(
      /^Invalid arguments: sbid: .+; numChannels: .+$/,
    );
  });

  it('should reject a radius beyond 180 degrees', () => {
    expect(() => validateOptions(ImagesOptionsSchema, { ra: '1', dec: '2', radius: '200' })).toThrow(
      InvalidArgumentError,
    );
  });

  it('should reject blank text arguments', () => {
    expect(() => validateOptions(ImagesOptionsSchema, { ra: ' ', dec: '2' })).toThrow(/^Invalid arguments: ra: /);
  });
});
