import { vi } from 'vitest';
import type { Logger } from '../src/log.js';
import type { Coordinates, DaycareResult, FacilityRecord } from '../src/types.js';

export const ORIGIN: Coordinates = { lat: 43.65, lon: -79.38 };

// Latitudes due north of ORIGIN at known haversine distances.
export const LAT_AT_KM = {
  0.5: 43.654497,
  1.1: 43.659893,
  3.2: 43.678778,
  5: 43.694966,
  5.004: 43.695002,
  5.01: 43.695056
} as const;

export function point(lat: number, lon: number): string {
  return JSON.stringify({ type: 'Point', coordinates: [lon, lat] });
}

export function facility(partial: Partial<FacilityRecord> & Pick<FacilityRecord, 'id'>): FacilityRecord {
  return {
    name: `Daycare ${partial.id}`,
    address: '1 Test St',
    postalCode: 'M5V 0A1',
    phone: '416-555-0100',
    geometry: point(ORIGIN.lat, ORIGIN.lon),
    spaces: { infant: null, toddler: null, preschool: null, kindergarten: null, schoolAge: null },
    totalSpaces: 0,
    subsidy: false,
    cwelcc: false,
    website: null,
    googleRating: null,
    googleReviewsCount: null,
    googleMapsUrl: null,
    ...partial
  };
}

export function daycareResult(partial: Partial<DaycareResult> & Pick<DaycareResult, 'id'>): DaycareResult {
  return {
    name: `Daycare ${partial.id}`,
    address: '1 Test St',
    postalCode: 'M5V 0A1',
    phone: '416-555-0100',
    distanceKm: 0,
    capacity: 1,
    totalSpaces: 10,
    subsidy: false,
    cwelcc: false,
    ageGroupLabel: 'Infant (0-18 months)',
    lat: ORIGIN.lat,
    lon: ORIGIN.lon,
    infantSpaces: 1,
    toddlerSpaces: 0,
    preschoolSpaces: 0,
    kindergartenSpaces: 0,
    schoolAgeSpaces: 0,
    website: null,
    googleRating: null,
    googleReviewsCount: null,
    googleMapsUrl: null,
    walkTime: null,
    transitTime: null,
    driveTime: null,
    ...partial
  };
}

export function silentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
