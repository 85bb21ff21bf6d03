import { filterPins } from './filter.js';
import { NO_MATCHES_HINT, STARTER_HINT } from './locale.js';
import type { Coordinates, Pin, PinFilter } from './types.js';

export interface SpotlightEntry {
  pin: Pin;
  heading: string;
  descriptionText: string;
  addressText: string;
  mapsUrl: string;
}

export interface PinListing {
  total: number;
  visible: number;
  entries: SpotlightEntry[];
  hints: string[];
}

export function googleMapsUrl(point: Coordinates): string {
  return `https://www.google.com/maps/search/?api=1&query=${point.lat},${point.lon}`;
}

export function toSpotlightEntry(pin: Pin): SpotlightEntry {
  return {
    pin,
    heading: `${pin.name} — ${pin.category}`,
    descriptionText: pin.description || 'No description provided.',
    addressText: pin.address || '—',
    mapsUrl: googleMapsUrl(pin),
  };
}

/**
 * Filtered table/spotlight rows plus the counters and nudges shown beside them.
 */
export function buildPinListing(pins: readonly Pin[], filter: PinFilter = {}): PinListing {
  const visible = filterPins(pins, filter);
  const hints: string[] = [];

  if (visible.length === 0) {
    hints.push(NO_MATCHES_HINT);
  }

  if (pins.length === 0) {
    hints.push(STARTER_HINT);
  }

  return {
    total: pins.length,
    visible: visible.length,
    entries: visible.map(toSpotlightEntry),
    hints,
  };
}
