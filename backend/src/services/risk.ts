import * as turf from "@turf/turf";
import type { Feature, LineString, MultiPolygon, Polygon, Position } from "geojson";
import { InvalidGeometryError } from "../errors";
import type { FloodZone, RiskAssessment, RiskColor, RiskTier, RoutePolyline } from "../types";
import { describeCoordinateProblem, toLngLat } from "../utils/coordinates";

/* ── Scoring curve ── */

export const MAX_RISK_SCORE = 10;

/** Share of the remaining headroom each additional zone takes. */
const ZONE_WEIGHT = 0.4;

/** Upper bounds (inclusive) per tier; a score on a boundary stays in the lower tier. */
const TIER_BOUNDS: { tier: RiskTier; max: number }[] = [
  { tier: "low", max: 3 },
  { tier: "medium", max: 6 },
  { tier: "high", max: MAX_RISK_SCORE },
];

const TIER_COLORS: Record<RiskTier, RiskColor> = {
  low: "green",
  medium: "yellow",
  high: "red",
};

/**
 * Diminishing-returns curve: `10 * (1 - 0.6^n)`, rounded to 2 decimals.
 * 1 zone → 4, 2 → 6.4, 3 → 7.84, 5 → 9.22, and it saturates at 10.
 */
export function scoreForIntersections(count: number): number {
  if (!Number.isFinite(count) || count <= 0) return 0;
  const raw = MAX_RISK_SCORE * (1 - (1 - ZONE_WEIGHT) ** Math.floor(count));
  return Math.min(MAX_RISK_SCORE, Math.round(raw * 100) / 100);
}

export function tierForScore(score: number): RiskTier {
  for (const { tier, max } of TIER_BOUNDS) {
    if (score <= max) return tier;
  }
  return "high";
}

export function colorForTier(tier: RiskTier): RiskColor {
  return TIER_COLORS[tier];
}

/* ── Geometry ── */

function toLineString(route: RoutePolyline): Feature<LineString> {
  if (route.points.length < 2) {
    throw new InvalidGeometryError(`Route needs at least 2 points, got ${route.points.length}`);
  }
  const coordinates = route.points.map((point, i) => {
    const problem = describeCoordinateProblem(point.lat, point.lng);
    if (problem) throw new InvalidGeometryError(`Route point ${i}: ${problem}`);
    return toLngLat(point);
  });
  return turf.lineString(coordinates);
}

function samePosition(a: Position, b: Position): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

function distinctVertexCount(ring: Position[]): number {
  const keys = new Set(ring.map(([lng, lat]) => `${lng},${lat}`));
  return keys.size;
}

function closeRing(ring: Position[]): Position[] {
  if (ring.length > 0 && samePosition(ring[0], ring[ring.length - 1])) return ring;
  return [...ring, ring[0]];
}

/**
 * Zone geometry ready for the intersection test, or a reason it cannot be
 * used. Rings are closed when the source left them open.
 */
function zoneFeature(zone: FloodZone): Feature<Polygon | MultiPolygon> | string {
  const polygons = zone.geometry.type === "Polygon" ? [zone.geometry.coordinates] : zone.geometry.coordinates;
  if (polygons.length === 0) return "no polygons";

  for (const rings of polygons) {
    const outer = rings[0];
    if (!outer || distinctVertexCount(outer) < 3) {
      return `outer ring has ${outer ? distinctVertexCount(outer) : 0} distinct points`;
    }
  }

  const closed = polygons.map((rings) =>
    rings.filter((ring) => ring.length > 0).map(closeRing)
  );

  return zone.geometry.type === "Polygon"
    ? turf.feature<Polygon>({ type: "Polygon", coordinates: closed[0] })
    : turf.feature<MultiPolygon>({ type: "MultiPolygon", coordinates: closed });
}

/* ── Assessment ── */

/**
 * Overlay a route on the flood zones. Intersection is tested in degree space
 * (no projection), which is fine at city scale. Malformed zones are logged and
 * skipped.
 */
export function assessRoute(route: RoutePolyline, zones: readonly FloodZone[]): RiskAssessment {
  const line = toLineString(route);
  const intersected: FloodZone[] = [];

  for (const zone of zones) {
    const feature = zoneFeature(zone);
    if (typeof feature === "string") {
      console.warn(`[risk] Skipping flood zone ${zone.id}: ${feature}`);
      continue;
    }
    if (turf.booleanIntersects(line, feature)) {
      intersected.push(zone);
    }
  }

  const intersectionCount = intersected.length;
  const riskScore = scoreForIntersections(intersectionCount);
  const riskTier = tierForScore(riskScore);

  return {
    intersectionCount,
    riskScore,
    riskTier,
    riskColor: colorForTier(riskTier),
    intersectedZoneIds: intersected.map((zone) => zone.id),
    warnings: buildWarnings(intersected, riskTier),
    // No alternative-route search is performed.
    alternativeAvailable: false,
  };
}

function buildWarnings(intersected: FloodZone[], tier: RiskTier): string[] {
  const count = intersected.length;
  if (count === 0) return [];

  const noun = count === 1 ? "flood-prone area" : "flood-prone areas";
  const warnings = [`Route passes through ${count} ${noun} (${tier} flood risk)`];

  for (const zone of intersected) {
    if (zone.name) warnings.push(`Crosses flood-prone area: ${zone.name}`);
  }
  return warnings;
}
