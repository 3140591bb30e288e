import type { Coordinates } from './types.js';

const EARTH_RADIUS_KM = 6371.0;
export const DEFAULT_RADIUS_KM = 10;
export const MIN_RADIUS_KM = 1;
export const MAX_RADIUS_KM = 100;

export interface Locatable {
  latitude?: number | null;
  longitude?: number | null;
}

export interface ProximityQuery {
  center?: Coordinates;
  /** Assumed already within [MIN_RADIUS_KM, MAX_RADIUS_KM]. */
  radiusKm: number;
}

export type Distance =
  | { kind: 'known'; km: number }
  | { kind: 'unknown'; reason: 'no-location' | 'anomaly' }
  | { kind: 'not-requested' };

export interface Ranked<T> {
  item: T;
  distance: Distance;
}

export type ProximityResult<T> = T & { distanceKm?: number };

type Location =
  | { kind: 'located'; coordinates: Coordinates }
  | { kind: 'missing' }
  | { kind: 'malformed' };

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;

/** Great-circle distance on a spherical earth, in kilometres. */
export function haversineKm(from: Coordinates, to: Coordinates): number {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLon = toRadians(to.longitude - from.longitude);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(from.latitude)) * Math.cos(toRadians(to.latitude)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(a));
}

export function roundKm(km: number): number {
  return Math.round(km * 100) / 100;
}

// Half a coordinate pair counts as no location at all.
export function locationOf(value: Locatable): Location {
  const { latitude, longitude } = value;
  if (latitude === null || latitude === undefined || longitude === null || longitude === undefined) {
    return { kind: 'missing' };
  }
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    return { kind: 'malformed' };
  }
  return { kind: 'located', coordinates: { latitude, longitude } };
}

function measure(center: Coordinates, value: Locatable): Distance {
  const location = locationOf(value);
  switch (location.kind) {
    case 'missing':
      return { kind: 'unknown', reason: 'no-location' };
    case 'malformed':
      return { kind: 'unknown', reason: 'anomaly' };
    case 'located': {
      const km = haversineKm(center, location.coordinates);
      return Number.isFinite(km) ? { kind: 'known', km } : { kind: 'unknown', reason: 'anomaly' };
    }
  }
}

function compareDistances(a: Distance, b: Distance): number {
  if (a.kind === 'known' && b.kind === 'known') return a.km - b.km;
  if (a.kind === 'known') return -1;
  if (b.kind === 'known') return 1;
  return 0;
}

/**
 * Filters `items` to those within `radiusKm` of the center and orders them
 * nearest first. Without a center every item is returned in input order.
 *
 * Items whose distance cannot be known (no location, or coordinates that do
 * not compute) are kept and placed after every measured item, in input order.
 */
export function rankByProximity<T extends Locatable>(items: readonly T[], query: ProximityQuery): Ranked<T>[] {
  const { center, radiusKm } = query;
  if (!center) {
    return items.map(item => ({ item, distance: { kind: 'not-requested' } }));
  }

  return items
    .map((item): Ranked<T> => ({ item, distance: measure(center, item) }))
    .filter(({ distance }) => distance.kind !== 'known' || distance.km <= radiusKm)
    .sort((a, b) => compareDistances(a.distance, b.distance));
}

export function toProximityResults<T extends object>(ranked: readonly Ranked<T>[]): ProximityResult<T>[] {
  return ranked.map(({ item, distance }) =>
    distance.kind === 'known' ? { ...item, distanceKm: roundKm(distance.km) } : { ...item }
  );
}
