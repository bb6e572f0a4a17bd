import type { GeoPoint, TimedFix } from '@skyfuse/shared';
import { InvalidCoordinateError, NonPositiveIntervalError } from '../errors.js';

export const EARTH_RADIUS_KM = 6371.0088;

const DEG = Math.PI / 180;

export function isValidCoordinate(p: GeoPoint): boolean {
  return Number.isFinite(p.latitude) && Number.isFinite(p.longitude)
    && p.latitude >= -90 && p.latitude <= 90
    && p.longitude >= -180 && p.longitude <= 180;
}

function assertCoordinate(p: GeoPoint): void {
  if (!isValidCoordinate(p)) throw new InvalidCoordinateError(p.latitude, p.longitude);
}

/** Great-circle distance (haversine, mean Earth radius). */
export function distanceKm(a: GeoPoint, b: GeoPoint): number {
  assertCoordinate(a);
  assertCoordinate(b);
  const dLat = (b.latitude - a.latitude) * DEG;
  const dLng = (b.longitude - a.longitude) * DEG;
  const h = Math.sin(dLat / 2) ** 2
    + Math.cos(a.latitude * DEG) * Math.cos(b.latitude * DEG) * Math.sin(dLng / 2) ** 2;
  return EARTH_RADIUS_KM * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

export function elapsedSeconds(a: TimedFix, b: TimedFix): number {
  return (b.timestamp - a.timestamp) / 1000;
}

export function elapsedHours(a: TimedFix, b: TimedFix): number {
  return (b.timestamp - a.timestamp) / 3_600_000;
}

/**
 * Speed needed to travel from `a` to `b` in the time between them.
 * Throws NonPositiveIntervalError when `b` is not strictly after `a`.
 */
export function impliedSpeedKmh(a: TimedFix, b: TimedFix): number {
  if (b.timestamp <= a.timestamp) throw new NonPositiveIntervalError(a.timestamp, b.timestamp);
  return distanceKm(a, b) / elapsedHours(a, b);
}
