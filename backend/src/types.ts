import type { MultiPolygon, Polygon } from "geojson";

/** WGS84 degrees. */
export type Coordinate = {
  readonly lat: number;
  readonly lng: number;
};

/** Path returned by the routing provider, ordered start → end. */
export type RoutePolyline = {
  readonly points: readonly Coordinate[];
  readonly distanceKm: number;
  readonly durationMinutes: number;
};

/**
 * One flood-prone area. `properties` are the source attributes (name,
 * return_period, ...), served back on /flood-zones; scoring does not read them.
 */
export type FloodZone = {
  readonly id: string;
  readonly name: string | null;
  readonly geometry: Polygon | MultiPolygon;
  readonly properties: Readonly<Record<string, unknown>>;
};

/** 3-level display: low (green), medium (yellow), high (red). */
export type RiskTier = "low" | "medium" | "high";
export type RiskColor = "green" | "yellow" | "red";

export type RiskAssessment = {
  intersectionCount: number;
  riskScore: number;
  riskTier: RiskTier;
  riskColor: RiskColor;
  intersectedZoneIds: string[];
  warnings: string[];
  alternativeAvailable: boolean;
};

export type RouteResult = {
  routeId: string;
  route: RoutePolyline;
  assessment: RiskAssessment;
};
