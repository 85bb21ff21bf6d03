import type { PinCategory } from './categories.js';

export interface Coordinates {
  lat: number;
  lon: number;
}

/**
 * A point of interest dropped on the community map.
 * Field names match the CSV columns so rows round-trip without mapping.
 */
export interface Pin extends Coordinates {
  name: string;
  category: PinCategory;
  description: string;
  address: string;
  likes: number;
  added_at: string;
}

/** Everything needed to create a pin, before likes/timestamp are assigned. */
export interface PinDraft extends Coordinates {
  name: string;
  category: PinCategory;
  description: string;
  address: string;
}

/**
 * Identity used to resolve a like. There is no unique key, so pins sharing
 * all four values are indistinguishable and the first one wins.
 */
export type PinIdentity = Pick<Pin, 'name' | 'category' | 'lat' | 'lon'>;

export interface PinFilter {
  categories?: readonly PinCategory[];
  query?: string;
}

/**
 * Session-scoped map state. Handlers receive it explicitly; nothing is global.
 */
export interface MapSessionState {
  pins: Pin[];
}

export type Clock = () => Date;
