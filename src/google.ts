import { UpstreamServiceError } from './errors.js';
import { formatPoint } from './geo.js';
import { buildUrl, fetchJson } from './http.js';
import { errorMessage, type Logger } from './log.js';
import type { Coordinates, Geocoder, ServiceConfig, TravelTimeProvider, TravelTimes } from './types.js';

export type GoogleMapsConfig = Pick<
  ServiceConfig,
  'googleMapsApiKey' | 'googleMapsBaseUrl' | 'requestTimeoutMs' | 'targetCity' | 'targetRegion'
>;

export type TravelMode = 'walking' | 'transit' | 'driving';

/** Distance Matrix caps destinations per request. */
export const DISTANCE_MATRIX_BATCH_SIZE = 25;

export const UNAVAILABLE = 'N/A';

// Only exact or interpolated street-number matches are precise enough to search from.
const PRECISE_LOCATION_TYPES = new Set(['ROOFTOP', 'RANGE_INTERPOLATED']);

type JsonObject = Record<string, unknown>;

function asObject(value: unknown): JsonObject | null {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? (value as JsonObject) : null;
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function requireApiKey(config: GoogleMapsConfig, service: string): string {
  if (!config.googleMapsApiKey) {
    throw new UpstreamServiceError(service, 'GOOGLE_MAPS_API_KEY is not configured');
  }
  return config.googleMapsApiKey;
}

/**
 * Adds the target city and region unless the address already names the city.
 */
export function qualifyAddress(address: string, city: string, region: string): string {
  if (address.toLowerCase().includes(city.toLowerCase())) {
    return address;
  }
  return `${address}, ${city}, ${region}`;
}

/**
 * Picks coordinates from the first geocoding result if it is a precise street address
 * inside the target city. Anything vaguer counts as not found.
 */
export function pickGeocodeMatch(body: unknown, city: string): Coordinates | null {
  const [first] = asArray(asObject(body)?.results);
  const result = asObject(first);
  const geometry = asObject(result?.geometry);
  const location = asObject(geometry?.location);
  if (!result || !geometry || !location) {
    return null;
  }

  const locationType = typeof geometry.location_type === 'string' ? geometry.location_type : '';
  if (!PRECISE_LOCATION_TYPES.has(locationType)) {
    return null;
  }

  let inCity = false;
  let hasStreet = false;
  for (const item of asArray(result.address_components)) {
    const component = asObject(item);
    const types = asArray(component?.types);
    const name = typeof component?.long_name === 'string' ? component.long_name.toLowerCase() : '';
    if (types.includes('locality') && name.includes(city.toLowerCase())) {
      inCity = true;
    }
    if (types.includes('street_number') || types.includes('route')) {
      hasStreet = true;
    }
  }
  if (!inCity || !hasStreet) {
    return null;
  }

  const { lat, lng } = location;
  if (typeof lat !== 'number' || typeof lng !== 'number') {
    return null;
  }
  return { lat, lon: lng };
}

export class GoogleGeocoder implements Geocoder {
  private readonly config: GoogleMapsConfig;
  private readonly log: Logger;

  constructor(config: GoogleMapsConfig, log: Logger) {
    this.config = config;
    this.log = log;
  }

  async geocode(address: string, signal?: AbortSignal): Promise<Coordinates | null> {
    const key = requireApiKey(this.config, 'geocoding');
    const url = buildUrl(this.config.googleMapsBaseUrl, '/maps/api/geocode/json', {
      address: qualifyAddress(address, this.config.targetCity, this.config.targetRegion),
      key
    });

    const body = await fetchJson(
      { service: 'geocoding', url, timeoutMs: this.config.requestTimeoutMs, signal },
      this.log
    );

    const status = asObject(body)?.status;
    if (status === 'ZERO_RESULTS') {
      return null;
    }
    if (status !== 'OK') {
      throw new UpstreamServiceError('geocoding', `Geocoding failed with status ${String(status)}`);
    }

    const match = pickGeocodeMatch(body, this.config.targetCity);
    if (!match) {
      this.log.info('Rejected imprecise geocoding match');
    }
    return match;
  }
}

/**
 * Reads one duration text per destination from a Distance Matrix response.
 * Elements without an `OK` status, and any missing elements, become `"N/A"`.
 */
export function readDurations(body: unknown, expected: number): string[] {
  const [row] = asArray(asObject(body)?.rows);
  const elements = asArray(asObject(row)?.elements);
  const durations: string[] = [];
  for (let i = 0; i < expected; i += 1) {
    const element = asObject(elements[i]);
    const text = asObject(element?.duration)?.text;
    durations.push(element?.status === 'OK' && typeof text === 'string' ? text : UNAVAILABLE);
  }
  return durations;
}

export class GoogleDistanceMatrix implements TravelTimeProvider {
  private readonly config: GoogleMapsConfig;
  private readonly log: Logger;

  constructor(config: GoogleMapsConfig, log: Logger) {
    this.config = config;
    this.log = log;
  }

  async travelTimes(origin: Coordinates, destinations: Coordinates[], signal?: AbortSignal): Promise<TravelTimes[]> {
    if (destinations.length === 0) {
      return [];
    }

    const walk = await this.durationsForMode(origin, destinations, 'walking', signal);
    const transit = await this.durationsForMode(origin, destinations, 'transit', signal);
    const drive = await this.durationsForMode(origin, destinations, 'driving', signal);

    return destinations.map((_, index) => ({
      walk: walk[index],
      transit: transit[index],
      drive: drive[index]
    }));
  }

  private async durationsForMode(
    origin: Coordinates,
    destinations: Coordinates[],
    mode: TravelMode,
    signal?: AbortSignal
  ): Promise<string[]> {
    const durations: string[] = [];

    for (let start = 0; start < destinations.length; start += DISTANCE_MATRIX_BATCH_SIZE) {
      const batch = destinations.slice(start, start + DISTANCE_MATRIX_BATCH_SIZE);
      try {
        durations.push(...(await this.fetchBatch(origin, batch, mode, signal)));
      } catch (error) {
        this.log.warn('Travel times unavailable for batch', {
          mode,
          size: batch.length,
          error: errorMessage(error)
        });
        durations.push(...batch.map(() => UNAVAILABLE));
      }
    }

    return durations;
  }

  private async fetchBatch(
    origin: Coordinates,
    batch: Coordinates[],
    mode: TravelMode,
    signal?: AbortSignal
  ): Promise<string[]> {
    const key = requireApiKey(this.config, 'distanceMatrix');
    const url = buildUrl(this.config.googleMapsBaseUrl, '/maps/api/distancematrix/json', {
      origins: formatPoint(origin),
      destinations: batch.map(formatPoint).join('|'),
      mode,
      units: 'metric',
      key
    });

    const body = await fetchJson(
      { service: 'distanceMatrix', url, timeoutMs: this.config.requestTimeoutMs, signal },
      this.log
    );
    const status = asObject(body)?.status;
    if (status !== 'OK') {
      throw new UpstreamServiceError('distanceMatrix', `Distance matrix failed with status ${String(status)}`);
    }
    return readDurations(body, batch.length);
  }
}
