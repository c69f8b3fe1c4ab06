import { spacesFor } from './age.js';
import { haversineDistanceKm, parsePoint, roundTo } from './geo.js';
import type { AgeGroup, Coordinates, DaycareResult, FacilityRecord, TravelTimes } from './types.js';

export const SEARCH_RADIUS_KM = 5;

/** Only this many of the nearest results are sent to the travel-time provider. */
export const TRAVEL_TIME_LIMIT = 20;

export function toDaycareResult(
  facility: FacilityRecord,
  coordinates: Coordinates,
  distanceKm: number,
  capacity: number,
  ageGroup: AgeGroup
): DaycareResult {
  return {
    id: facility.id,
    name: facility.name,
    address: facility.address,
    postalCode: facility.postalCode,
    phone: facility.phone,
    distanceKm,
    capacity,
    totalSpaces: facility.totalSpaces,
    subsidy: facility.subsidy,
    cwelcc: facility.cwelcc,
    ageGroupLabel: ageGroup.label,
    lat: coordinates.lat,
    lon: coordinates.lon,
    infantSpaces: facility.spaces.infant ?? 0,
    toddlerSpaces: facility.spaces.toddler ?? 0,
    preschoolSpaces: facility.spaces.preschool ?? 0,
    kindergartenSpaces: facility.spaces.kindergarten ?? 0,
    schoolAgeSpaces: facility.spaces.schoolAge ?? 0,
    website: facility.website,
    googleRating: facility.googleRating,
    googleReviewsCount: facility.googleReviewsCount,
    googleMapsUrl: facility.googleMapsUrl,
    walkTime: null,
    transitTime: null,
    driveTime: null
  };
}

/** Ascending by distance; equal distances keep their dataset order. */
export function sortByDistance<T extends { distanceKm: number }>(results: T[]): T[] {
  return [...results].sort((a, b) => a.distanceKm - b.distanceKm);
}

/**
 * Keeps facilities within `radiusKm` of `origin` that have open spaces for the age group,
 * nearest first. Rows with unreadable geometry are skipped.
 */
export function findNearbyDaycares(
  origin: Coordinates,
  facilities: FacilityRecord[],
  ageGroup: AgeGroup,
  radiusKm: number = SEARCH_RADIUS_KM
): DaycareResult[] {
  const results: DaycareResult[] = [];

  for (const facility of facilities) {
    const coordinates = parsePoint(facility.geometry);
    if (coordinates === null) {
      continue;
    }

    // Rounded first so a displayed distance never exceeds the radius.
    const distanceKm = roundTo(haversineDistanceKm(origin, coordinates), 2);
    if (distanceKm > radiusKm) {
      continue;
    }

    const capacity = spacesFor(facility.spaces, ageGroup.key);
    if (capacity === null || capacity <= 0) {
      continue;
    }

    results.push(toDaycareResult(facility, coordinates, distanceKm, capacity, ageGroup));
  }

  return sortByDistance(results);
}

/**
 * Copies travel times onto the leading results, in order.
 * Results beyond the supplied times keep `null` travel times.
 */
export function applyTravelTimes(results: DaycareResult[], travelTimes: TravelTimes[]): DaycareResult[] {
  return results.map((result, index) => {
    const times = travelTimes[index];
    if (!times) {
      return result;
    }
    return { ...result, walkTime: times.walk, transitTime: times.transit, driveTime: times.drive };
  });
}
