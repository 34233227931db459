export { registerImagesCommand } from './images.command';
export { registerCutoutsCommand } from './cutouts.command';
export { registerSliceCommand } from './slice.command';
export { registerSourcesCommand } from './sources.command';
export { registerSpectraCommand } from './spectra.command';
export { registerProjectCutoutsCommand } from './project-cutouts.command';
