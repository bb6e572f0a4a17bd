import { describe, it, expect } from 'vitest';
import { distanceKm, impliedSpeedKmh, isValidCoordinate } from './distance.js';
import { InvalidCoordinateError, NonPositiveIntervalError } from '../errors.js';

const BEIRUT = { latitude: 33.8938, longitude: 35.5018 };
const LARNACA = { latitude: 34.8751, longitude: 33.6249 };

describe('distanceKm', () => {
  it('is zero for the same point', () => {
    expect(distanceKm(BEIRUT, BEIRUT)).toBe(0);
  });

  it('is symmetric', () => {
    expect(distanceKm(BEIRUT, LARNACA)).toBeCloseTo(distanceKm(LARNACA, BEIRUT), 9);
  });

  it('gives about 111.195 km per degree along a meridian', () => {
    expect(distanceKm({ latitude: 0, longitude: 0 }, { latitude: 1, longitude: 0 })).toBeCloseTo(111.195, 2);
  });

  it('rejects coordinates outside the globe', () => {
    expect(() => distanceKm({ latitude: 91, longitude: 0 }, BEIRUT)).toThrow(InvalidCoordinateError);
    expect(() => distanceKm(BEIRUT, { latitude: 0, longitude: -180.5 })).toThrow(InvalidCoordinateError);
    expect(isValidCoordinate({ latitude: Number.NaN, longitude: 0 })).toBe(false);
  });
});

describe('impliedSpeedKmh', () => {
  it('divides distance by elapsed hours', () => {
    const a = { latitude: 0, longitude: 0, timestamp: 0 };
    const b = { latitude: 1, longitude: 0, timestamp: 3_600_000 };
    expect(impliedSpeedKmh(a, b)).toBeCloseTo(111.195, 2);
  });

  it('throws when the second fix is not strictly later', () => {
    const a = { ...BEIRUT, timestamp: 1000 };
    expect(() => impliedSpeedKmh(a, { ...BEIRUT, timestamp: 1000 })).toThrow(NonPositiveIntervalError);
    expect(() => impliedSpeedKmh(a, { ...BEIRUT, timestamp: 999 })).toThrow(NonPositiveIntervalError);
  });
});
