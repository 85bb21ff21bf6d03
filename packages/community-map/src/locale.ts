import type { Coordinates } from './types.js';

/** Approximate center of Halifax, North Carolina. */
export const DEFAULT_CENTER: Coordinates = { lat: 36.33, lon: -77.59 };

/** Appended to free-text addresses so the geocoder stays in town. */
export const GEOCODE_LOCALITY = 'Halifax, North Carolina';

export const PINS_EXPORT_FILE_NAME = 'halifax_pins.csv';

export const EMPTY_MAP_HINT = 'No pins yet. Add your first spot on the left!';
export const NO_MATCHES_HINT = 'No matching spots yet. Try different filters or add a place!';
export const STARTER_HINT =
  "Need ideas? Add Ralph's Barbecue (w/ address) or the Halifax County Courthouse to get started.";
