/** DataLink service_def names of the archive's SODA services */
export const IMAGE_DOWNLOAD_SERVICE = 'async_service';
export const CUTOUT_SERVICE = 'cutout_service';
export const SPECTRUM_SERVICE = 'spectrum_generation_service';
