import { describe, expect, it } from 'vitest';
import { formatPoint, haversineDistanceKm, parsePoint, roundTo } from '../src/geo.js';

describe('haversineDistanceKm', () => {
  it('returns zero for identical coordinates', () => {
    expect(haversineDistanceKm({ lat: 43.65, lon: -79.38 }, { lat: 43.65, lon: -79.38 })).toBe(0);
  });

  it('is symmetric', () => {
    const a = { lat: 43.65, lon: -79.38 };
    const b = { lat: 43.7, lon: -79.4 };
    expect(haversineDistanceKm(a, b)).toBe(haversineDistanceKm(b, a));
  });

  it('computes distance between Toronto points', () => {
    const distance = haversineDistanceKm({ lat: 43.65, lon: -79.38 }, { lat: 43.7, lon: -79.4 });
    expect(distance).toBeCloseTo(5.7877, 3);
  });
});

describe('roundTo', () => {
  it('rounds to the given decimals', () => {
    expect(roundTo(5.004, 2)).toBe(5);
    expect(roundTo(1.2345, 2)).toBe(1.23);
  });
});

describe('parsePoint', () => {
  it('swaps GeoJSON [lon, lat] into lat/lon', () => {
    expect(parsePoint('{"type": "Point", "coordinates": [-79.4, 43.7]}')).toEqual({ lat: 43.7, lon: -79.4 });
  });

  it('accepts parsed objects', () => {
    expect(parsePoint({ type: 'Point', coordinates: [-79.38, 43.65] })).toEqual({ lat: 43.65, lon: -79.38 });
  });

  it('round-trips a coordinate', () => {
    const original = { lat: 43.671234, lon: -79.298765 };
    const encoded = JSON.stringify({ type: 'Point', coordinates: [original.lon, original.lat] });
    expect(parsePoint(encoded)).toEqual(original);
  });

  it('returns null for other geometries and malformed input', () => {
    expect(parsePoint('{"type": "LineString", "coordinates": [[-79.4, 43.7], [-79.3, 43.6]]}')).toBeNull();
    expect(parsePoint('{"coordinates": [-79.4, 43.7]}')).toBeNull();
    expect(parsePoint('{"type": "Point"}')).toBeNull();
    expect(parsePoint('{"type": "Point", "coordinates": ["a", "b"]}')).toBeNull();
    expect(parsePoint('not json')).toBeNull();
    expect(parsePoint('')).toBeNull();
    expect(parsePoint(null)).toBeNull();
  });
});

describe('formatPoint', () => {
  it('writes lat,lon', () => {
    expect(formatPoint({ lat: 43.65, lon: -79.38 })).toBe('43.65,-79.38');
  });
});
