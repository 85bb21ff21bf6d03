import { z } from 'zod';
import type { Coordinates } from './types.js';

const DEFAULT_BASE_URL = 'https://nominatim.openstreetmap.org';
const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Resolves a free-text address to coordinates. `null` means "no usable match";
 * transport and HTTP failures reject.
 */
export interface Geocoder {
  geocode(query: string): Promise<Coordinates | null>;
}

export class GeocoderHttpError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`Geocoder request failed with status ${status}`);
    this.name = 'GeocoderHttpError';
    this.status = status;
    this.body = body;
  }
}

const coordinateValue = z.union([z.string(), z.number()]);
const searchResponseSchema = z.array(
  z
    .object({
      lat: coordinateValue,
      lon: coordinateValue,
    })
    .passthrough(),
);

function toFiniteNumber(value: string | number): number | undefined {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export interface NominatimGeocoderOptions {
  baseUrl?: string;
  userAgent: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class NominatimGeocoder implements Geocoder {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: NominatimGeocoderOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async geocode(query: string): Promise<Coordinates | null> {
    const q = query.trim();
    if (!q) {
      return null;
    }

    const params = new URLSearchParams({ q, format: 'json', limit: '1' });
    const payload = await this.request(`/search?${params.toString()}`);

    const parsed = searchResponseSchema.safeParse(payload);
    if (!parsed.success) {
      return null;
    }

    const first = parsed.data[0];
    if (!first) {
      return null;
    }

    const lat = toFiniteNumber(first.lat);
    const lon = toFiniteNumber(first.lon);
    if (lat === undefined || lon === undefined) {
      return null;
    }

    return { lat, lon };
  }

  private async request(path: string): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: 'GET',
        signal: controller.signal,
        headers: {
          Accept: 'application/json',
          'User-Agent': this.userAgent,
        },
      });

      if (!response.ok) {
        throw new GeocoderHttpError(response.status, await response.text());
      }

      const payload: unknown = await response.json();
      return payload;
    } finally {
      clearTimeout(timeout);
    }
  }
}

/** Used when no geocoding service is configured; every lookup misses. */
export class NullGeocoder implements Geocoder {
  async geocode(): Promise<Coordinates | null> {
    return null;
  }
}
