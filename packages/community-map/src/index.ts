// Model
export { PIN_CATEGORIES, CATEGORY_COLORS, FALLBACK_CATEGORY, isPinCategory, colorForCategory } from './categories.js';
export type { PinCategory, RgbColor } from './categories.js';
export { DEFAULT_CENTER, GEOCODE_LOCALITY, PINS_EXPORT_FILE_NAME } from './locale.js';
export { pinFormSchema, pinIdentitySchema, PIN_NAME_REQUIRED } from './schema.js';
export type { PinForm, PinFormInput } from './schema.js';

// Session state
export { createMapSessionState, appendPin, likePin, formatAddedAt } from './store.js';
export { submitPin, importPins } from './session.js';
export type { MapSessionDeps, SubmitPinOutcome, ImportPinsOutcome, FieldIssue } from './session.js';

// Views
export { filterPins, parseCategorySelection } from './filter.js';
export { buildMapView, meanCenter } from './map-view.js';
export type { MapView, MapLayer, MapPoint, MapViewOptions } from './map-view.js';
export { buildPinListing, toSpotlightEntry, googleMapsUrl } from './spotlight.js';
export type { PinListing, SpotlightEntry } from './spotlight.js';

// CSV
export { exportPinsCsv, parsePinsCsv, PinCsvError, PIN_CSV_COLUMNS } from './csv.js';

// Geocoding
export { NominatimGeocoder, NullGeocoder, GeocoderHttpError } from './geocoder.js';
export type { Geocoder, NominatimGeocoderOptions } from './geocoder.js';

// Types
export type { Pin, PinDraft, PinIdentity, PinFilter, MapSessionState, Coordinates, Clock } from './types.js';
