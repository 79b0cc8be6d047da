import { z } from "zod";
import { InvalidRouteRequestError } from "../errors";
import type { Coordinate } from "../types";

export const LAT_RANGE = [-90, 90] as const;
export const LNG_RANGE = [-180, 180] as const;

/** Wire shape only; bounds are enforced by {@link describeCoordinateProblem}. */
export const coordinateSchema = z.object({
  lat: z.number(),
  lng: z.number(),
});

/** Returns why a lat/lng pair is not a valid WGS84 coordinate, or null if it is. */
export function describeCoordinateProblem(lat: number, lng: number): string | null {
  if (!Number.isFinite(lat) || !Number.isFinite(lng)) {
    return `coordinate (${lat}, ${lng}) is not finite`;
  }
  if (lat < LAT_RANGE[0] || lat > LAT_RANGE[1]) {
    return `latitude ${lat} is outside [${LAT_RANGE[0]}, ${LAT_RANGE[1]}]`;
  }
  if (lng < LNG_RANGE[0] || lng > LNG_RANGE[1]) {
    return `longitude ${lng} is outside [${LNG_RANGE[0]}, ${LNG_RANGE[1]}]`;
  }
  return null;
}

export function makeCoordinate(lat: number, lng: number): Coordinate {
  const problem = describeCoordinateProblem(lat, lng);
  if (problem) throw new InvalidRouteRequestError(problem);
  return Object.freeze({ lat, lng });
}

/** 5 decimal places ≈ 1.1m. */
export function roundCoord(value: number, decimals = 5): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function coordinateKey(c: Coordinate): string {
  return `${roundCoord(c.lat).toFixed(5)},${roundCoord(c.lng).toFixed(5)}`;
}

/** GeoJSON position order. */
export function toLngLat(c: Coordinate): [number, number] {
  return [c.lng, c.lat];
}

/**
 * Rejects a start/end pair that cannot be routed: either point out of bounds,
 * or both the same point at key precision.
 */
export function validateRouteEndpoints(start: Coordinate, end: Coordinate): void {
  for (const [label, c] of [["start", start], ["end", end]] as const) {
    const problem = describeCoordinateProblem(c.lat, c.lng);
    if (problem) throw new InvalidRouteRequestError(`${label}: ${problem}`);
  }
  if (coordinateKey(start) === coordinateKey(end)) {
    throw new InvalidRouteRequestError("start and end must be different points");
  }
}
