import { randomUUID } from "crypto";
import type { FloodZoneStore } from "../store";
import type { Coordinate, RouteResult } from "../types";
import { toLngLat, validateRouteEndpoints } from "../utils/coordinates";
import { assessRoute } from "./risk";
import type { RouteProvider } from "./routing";

export type RouteResponse = {
  route_id: string;
  geometry: [number, number][]; // [lng, lat]
  risk_score: number;
  risk_tier: string;
  risk_color: string;
  flood_intersections: number;
  distance_km: number;
  estimated_time_minutes: number;
  warnings: string[];
  alternative_available: boolean;
};

/**
 * Request orchestration: validate → route → assess → assemble. Input is
 * rejected before the provider is called; provider and geometry errors pass
 * through untouched.
 */
export class RouteOptimizer {
  constructor(
    private readonly provider: RouteProvider,
    private readonly zones: FloodZoneStore,
    private readonly newId: () => string = randomUUID
  ) {}

  async optimize(start: Coordinate, end: Coordinate): Promise<RouteResult> {
    validateRouteEndpoints(start, end);

    const route = await this.provider.getRoute(start, end);
    const assessment = assessRoute(route, this.zones.all());

    return { routeId: this.newId(), route, assessment };
  }
}

export function toRouteResponse(result: RouteResult): RouteResponse {
  const { route, assessment } = result;
  return {
    route_id: result.routeId,
    geometry: route.points.map(toLngLat),
    risk_score: Math.round(assessment.riskScore * 100) / 100,
    risk_tier: assessment.riskTier,
    risk_color: assessment.riskColor,
    flood_intersections: assessment.intersectionCount,
    distance_km: Math.round(route.distanceKm * 100) / 100,
    estimated_time_minutes: Math.round(route.durationMinutes),
    warnings: assessment.warnings,
    alternative_available: assessment.alternativeAvailable,
  };
}
