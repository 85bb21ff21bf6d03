import type { MapSessionState, Pin, PinDraft, PinIdentity } from './types.js';

export interface AppendPinOptions {
  now: Date;
  /** Carried over from an import; new pins start at zero. */
  likes?: number;
  /** Carried over from an import; defaults to `now`. */
  addedAt?: string;
}

export function createMapSessionState(pins: readonly Pin[] = []): MapSessionState {
  return { pins: [...pins] };
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local wall-clock timestamp, `YYYY-MM-DD HH:mm:ss`.
 */
export function formatAddedAt(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Append a pin to the session. Text fields are trimmed; the name must survive trimming.
 */
export function appendPin(state: MapSessionState, draft: PinDraft, options: AppendPinOptions): Pin {
  const name = draft.name.trim();
  if (!name) {
    throw new Error('Pin name must not be empty');
  }

  const likes = options.likes !== undefined && Number.isInteger(options.likes) && options.likes >= 0 ? options.likes : 0;

  const pin: Pin = {
    name,
    category: draft.category,
    description: draft.description.trim(),
    address: draft.address.trim(),
    lat: draft.lat,
    lon: draft.lon,
    likes,
    added_at: options.addedAt ?? formatAddedAt(options.now),
  };

  state.pins.push(pin);
  return pin;
}

export function matchesIdentity(pin: Pin, target: PinIdentity): boolean {
  return (
    pin.name === target.name && pin.category === target.category && pin.lat === target.lat && pin.lon === target.lon
  );
}

/**
 * Increment the likes of the first pin matching `target` by one.
 * Returns the updated pin, or null when nothing matches.
 */
export function likePin(state: MapSessionState, target: PinIdentity): Pin | null {
  const index = state.pins.findIndex((pin) => matchesIdentity(pin, target));
  const current = index === -1 ? undefined : state.pins[index];
  if (!current) {
    return null;
  }

  const updated: Pin = { ...current, likes: current.likes + 1 };
  state.pins[index] = updated;
  return updated;
}
