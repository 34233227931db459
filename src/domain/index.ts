/**
 * Domain Layer Barrel Export
 *
 * The domain layer is the core of the application and has no framework dependencies.
 */

// Entities
export {
  ExtractionJobEntity,
  type ExtractionJobEntityData,
  type JobSnapshot,
} from './entities/extraction-job.entity';
export {
  CatalogueRecord,
  type CatalogueRow,
  type SpectralAxis,
} from './entities/catalogue-record.entity';

// Value Objects
export { JobPhaseVO, JobPhase } from './value-objects/job-phase.vo';
export { SkyPositionVO, type SkyPositionProps } from './value-objects/sky-position.vo';
export {
  ChannelSlicingVO,
  SPEED_OF_LIGHT_M_PER_S,
  type ChannelSlicingProps,
  type ChannelGroup,
  type WavelengthBand,
} from './value-objects/channel-slicing.vo';

// Errors
export * from './errors/archive.errors';

// Events
export * from './events';
