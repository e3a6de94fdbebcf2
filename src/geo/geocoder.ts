/**
 * Geocoding for sighting enrichment.
 *
 * Best effort by contract: every failure (disabled, timeout, HTTP error,
 * malformed body, no result) is logged as GEOCODING_UNAVAILABLE and comes
 * back as null. A sighting is never lost because geocoding failed.
 */

import { z } from 'zod';

import type { GeocodingConfig } from '../config/geocoding-config.js';
import { debug, debugTimedAsync, errorMessage } from '../shared/debug.js';
import type { StoneErrorCode } from '../shared/errors.js';

export interface ReverseGeocode {
  postalCode: string | null;
  city: string | null;
  country: string | null;
  displayName: string | null;
}

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface Geocoder {
  reverse(latitude: number, longitude: number): Promise<ReverseGeocode | null>;
  forward(postalCode: string): Promise<Coordinates | null>;
}

const ReverseResponse = z.object({
  display_name: z.string().optional(),
  address: z
    .object({
      postcode: z.string().optional(),
      city: z.string().optional(),
      town: z.string().optional(),
      village: z.string().optional(),
      country: z.string().optional(),
    })
    .optional(),
});

const SearchResponse = z.array(
  z.object({
    lat: z.coerce.number().finite(),
    lon: z.coerce.number().finite(),
  }),
);

const UNAVAILABLE: StoneErrorCode = 'GEOCODING_UNAVAILABLE';

/**
 * Nominatim-compatible geocoder (`/reverse` and `/search`).
 */
export class NominatimGeocoder implements Geocoder {
  constructor(private readonly config: GeocodingConfig) {}

  async reverse(latitude: number, longitude: number): Promise<ReverseGeocode | null> {
    const body = await this.get('/reverse', {
      lat: String(latitude),
      lon: String(longitude),
      format: 'json',
      addressdetails: '1',
    });
    if (body === null) return null;

    const parsed = ReverseResponse.safeParse(body);
    if (!parsed.success) {
      debug('geo', 'Malformed reverse response', { code: UNAVAILABLE });
      return null;
    }

    const address = parsed.data.address ?? {};
    const result: ReverseGeocode = {
      postalCode: address.postcode ?? null,
      city: address.city ?? address.town ?? address.village ?? null,
      country: address.country ?? null,
      displayName: parsed.data.display_name ?? null,
    };
    debug('geo', 'Reverse geocoded', { latitude, longitude, postalCode: result.postalCode });
    return result;
  }

  async forward(postalCode: string): Promise<Coordinates | null> {
    const body = await this.get('/search', {
      postalcode: postalCode,
      format: 'json',
      limit: '1',
    });
    if (body === null) return null;

    const parsed = SearchResponse.safeParse(body);
    if (!parsed.success) {
      debug('geo', 'Malformed search response', { code: UNAVAILABLE });
      return null;
    }

    const [first] = parsed.data;
    if (!first) {
      debug('geo', 'Postal code not found', { postalCode });
      return null;
    }

    debug('geo', 'Forward geocoded', { postalCode, latitude: first.lat, longitude: first.lon });
    return { latitude: first.lat, longitude: first.lon };
  }

  private async get(path: string, params: Record<string, string>): Promise<unknown> {
    if (!this.config.enabled) {
      return null;
    }

    const url = `${this.config.baseUrl}${path}?${new URLSearchParams(params).toString()}`;
    try {
      return await debugTimedAsync('geo', `GET ${path}`, async () => {
        const res = await fetch(url, {
          headers: { 'User-Agent': this.config.userAgent, Accept: 'application/json' },
          signal: AbortSignal.timeout(this.config.timeoutMs),
        });
        if (!res.ok) {
          throw new Error(`HTTP ${res.status}`);
        }
        return (await res.json()) as unknown;
      });
    } catch (err) {
      debug('geo', 'Geocoding request failed', {
        code: UNAVAILABLE,
        path,
        error: errorMessage(err),
      });
      return null;
    }
  }
}
