import { afterEach, describe, expect, it, vi } from 'vitest';
import { UpstreamServiceError } from '../src/errors.js';
import {
  GoogleDistanceMatrix,
  GoogleGeocoder,
  pickGeocodeMatch,
  qualifyAddress,
  readDurations,
  type GoogleMapsConfig
} from '../src/google.js';
import { ORIGIN, silentLogger } from './fixtures.js';

const config: GoogleMapsConfig = {
  googleMapsApiKey: 'test-key',
  googleMapsBaseUrl: 'https://maps.test',
  requestTimeoutMs: 1000,
  targetCity: 'Toronto',
  targetRegion: 'Ontario, Canada'
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function geocodeResult(locationType: string, locality: string, street = true) {
  const components = [{ long_name: locality, types: ['locality', 'political'] }];
  if (street) {
    components.push({ long_name: 'Queen Street West', types: ['route'] });
  }
  return {
    status: 'OK',
    results: [
      {
        geometry: { location: { lat: 43.6512, lng: -79.3832 }, location_type: locationType },
        address_components: components
      }
    ]
  };
}

function requestedUrl(fetchMock: { mock: { calls: unknown[][] } }, call: number): URL {
  const [input] = fetchMock.mock.calls[call];
  return new URL(String(input));
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('qualifyAddress', () => {
  it('adds the city and region when missing', () => {
    expect(qualifyAddress('100 Queen St W', 'Toronto', 'Ontario, Canada')).toBe(
      '100 Queen St W, Toronto, Ontario, Canada'
    );
    expect(qualifyAddress('100 Queen St W, toronto', 'Toronto', 'Ontario, Canada')).toBe('100 Queen St W, toronto');
  });
});

describe('pickGeocodeMatch', () => {
  it('accepts a precise street address in the city', () => {
    expect(pickGeocodeMatch(geocodeResult('ROOFTOP', 'Toronto'), 'Toronto')).toEqual({ lat: 43.6512, lon: -79.3832 });
    expect(pickGeocodeMatch(geocodeResult('RANGE_INTERPOLATED', 'Toronto'), 'Toronto')).toEqual({
      lat: 43.6512,
      lon: -79.3832
    });
  });

  it('rejects vague, out-of-city and streetless matches', () => {
    expect(pickGeocodeMatch(geocodeResult('APPROXIMATE', 'Toronto'), 'Toronto')).toBeNull();
    expect(pickGeocodeMatch(geocodeResult('ROOFTOP', 'Mississauga'), 'Toronto')).toBeNull();
    expect(pickGeocodeMatch(geocodeResult('ROOFTOP', 'Toronto', false), 'Toronto')).toBeNull();
    expect(pickGeocodeMatch({ results: [] }, 'Toronto')).toBeNull();
  });
});

describe('GoogleGeocoder', () => {
  it('geocodes a qualified address', async () => {
    const fetchMock = vi.fn(async () => jsonResponse(geocodeResult('ROOFTOP', 'Toronto')));
    vi.stubGlobal('fetch', fetchMock);

    const coordinates = await new GoogleGeocoder(config, silentLogger()).geocode('100 Queen St W');

    expect(coordinates).toEqual({ lat: 43.6512, lon: -79.3832 });
    const url = requestedUrl(fetchMock, 0);
    expect(url.pathname).toBe('/maps/api/geocode/json');
    expect(url.searchParams.get('address')).toBe('100 Queen St W, Toronto, Ontario, Canada');
    expect(url.searchParams.get('key')).toBe('test-key');
  });

  it('returns null when nothing matches', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ status: 'ZERO_RESULTS', results: [] })));

    await expect(new GoogleGeocoder(config, silentLogger()).geocode('nowhere')).resolves.toBeNull();
  });

  it('raises upstream errors for rejected requests and missing keys', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ status: 'REQUEST_DENIED' })));

    await expect(new GoogleGeocoder(config, silentLogger()).geocode('100 Queen St W')).rejects.toBeInstanceOf(
      UpstreamServiceError
    );
    await expect(
      new GoogleGeocoder({ ...config, googleMapsApiKey: null }, silentLogger()).geocode('100 Queen St W')
    ).rejects.toBeInstanceOf(UpstreamServiceError);
  });
});

describe('readDurations', () => {
  it('marks failed and missing elements unavailable', () => {
    const body = {
      rows: [{ elements: [{ status: 'OK', duration: { text: '12 mins' } }, { status: 'ZERO_RESULTS' }] }]
    };
    expect(readDurations(body, 3)).toEqual(['12 mins', 'N/A', 'N/A']);
  });
});

describe('GoogleDistanceMatrix', () => {
  it('batches destinations per mode and degrades failed batches', async () => {
    const fetchMock = vi.fn(async (input: string | URL | Request) => {
      const url = new URL(String(input));
      const count = (url.searchParams.get('destinations') ?? '').split('|').length;
      if (url.searchParams.get('mode') === 'transit') {
        return jsonResponse({ error_message: 'bad request' }, 400);
      }
      const text = url.searchParams.get('mode') === 'walking' ? '9 mins' : '3 mins';
      return jsonResponse({
        status: 'OK',
        rows: [{ elements: Array.from({ length: count }, () => ({ status: 'OK', duration: { text } })) }]
      });
    });
    vi.stubGlobal('fetch', fetchMock);

    const destinations = Array.from({ length: 30 }, (_, index) => ({ lat: 43.6 + index / 1000, lon: -79.4 }));
    const times = await new GoogleDistanceMatrix(config, silentLogger()).travelTimes(ORIGIN, destinations);

    expect(fetchMock).toHaveBeenCalledTimes(6);
    expect(requestedUrl(fetchMock, 0).searchParams.get('destinations')?.split('|')).toHaveLength(25);
    expect(requestedUrl(fetchMock, 1).searchParams.get('destinations')?.split('|')).toHaveLength(5);
    expect(requestedUrl(fetchMock, 0).searchParams.get('origins')).toBe('43.65,-79.38');
    expect(times).toHaveLength(30);
    expect(times[0]).toEqual({ walk: '9 mins', transit: 'N/A', drive: '3 mins' });
    expect(times[29]).toEqual({ walk: '9 mins', transit: 'N/A', drive: '3 mins' });
  });

  it('skips the provider for no destinations', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    await expect(new GoogleDistanceMatrix(config, silentLogger()).travelTimes(ORIGIN, [])).resolves.toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
