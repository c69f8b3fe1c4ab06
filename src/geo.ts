import type { Point } from 'geojson';
import type { Coordinates } from './types.js';

const EARTH_RADIUS_KM = 6371;

/**
 * Calculates the great-circle distance between two coordinates using the Haversine formula.
 * @returns Distance in kilometres, unrounded.
 */
export function haversineDistanceKm(from: Coordinates, to: Coordinates): number {
  const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;
  const dLat = toRadians(to.lat - from.lat);
  const dLon = toRadians(to.lon - from.lon);
  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(from.lat)) *
      Math.cos(toRadians(to.lat)) *
      Math.sin(dLon / 2) *
      Math.sin(dLon / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_KM * c;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function isPoint(value: unknown): value is Point {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const candidate = value as Record<string, unknown>;
  const coordinates = candidate.coordinates;
  return (
    candidate.type === 'Point' &&
    Array.isArray(coordinates) &&
    coordinates.length >= 2 &&
    typeof coordinates[0] === 'number' &&
    typeof coordinates[1] === 'number' &&
    Number.isFinite(coordinates[0]) &&
    Number.isFinite(coordinates[1])
  );
}

/**
 * Reads a GeoJSON Point, given as text or as a parsed object.
 * GeoJSON positions are `[lon, lat]`; the result is returned as `{ lat, lon }`.
 * Anything that is not a well-formed Point yields `null`.
 */
export function parsePoint(raw: unknown): Coordinates | null {
  let value = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch {
      return null;
    }
  }
  if (!isPoint(value)) {
    return null;
  }
  const [lon, lat] = value.coordinates;
  return { lat, lon };
}

export function formatPoint(coordinates: Coordinates): string {
  return `${coordinates.lat},${coordinates.lon}`;
}
