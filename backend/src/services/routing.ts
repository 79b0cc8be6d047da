import { z } from "zod";
import { NoRouteFoundError, ProviderUnavailableError } from "../errors";
import type { Coordinate, RoutePolyline } from "../types";
import { roundCoord, toLngLat, validateRouteEndpoints } from "../utils/coordinates";
import { Semaphore } from "../utils/semaphore";

/** Anything that can turn two points into a drivable path. */
export interface RouteProvider {
  readonly name: string;
  getRoute(start: Coordinate, end: Coordinate): Promise<RoutePolyline>;
}

/* ── openrouteservice ── */

export type OrsOptions = {
  apiKey: string | null;
  baseUrl?: string;
  profile?: string;
  timeoutMs?: number;
  maxAttempts?: number;
  maxConcurrency?: number;
  /** First retry delay; doubles per attempt up to `backoffMaxMs`. */
  backoffBaseMs?: number;
  backoffMaxMs?: number;
};

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

const orsResponseSchema = z.object({
  features: z
    .array(
      z.object({
        geometry: z.object({
          type: z.literal("LineString"),
          coordinates: z.array(z.array(z.number()).min(2)),
        }),
        properties: z
          .object({
            summary: z
              .object({
                distance: z.number().optional(), // metres
                duration: z.number().optional(), // seconds
              })
              .passthrough()
              .optional(),
          })
          .passthrough()
          .nullable()
          .optional(),
      })
    )
    .default([]),
});

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class OrsRouteProvider implements RouteProvider {
  readonly name = "openrouteservice";

  private readonly apiKey: string | null;
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly backoffBaseMs: number;
  private readonly backoffMaxMs: number;
  private readonly gate: Semaphore;

  constructor(options: OrsOptions) {
    const baseUrl = (options.baseUrl ?? "https://api.openrouteservice.org").replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.url = `${baseUrl}/v2/directions/${options.profile ?? "driving-car"}/geojson`;
    this.timeoutMs = options.timeoutMs ?? 20_000;
    this.maxAttempts = options.maxAttempts ?? 5;
    this.backoffBaseMs = options.backoffBaseMs ?? 400;
    this.backoffMaxMs = options.backoffMaxMs ?? 4_000;
    this.gate = new Semaphore(options.maxConcurrency ?? 1);
  }

  async getRoute(start: Coordinate, end: Coordinate): Promise<RoutePolyline> {
    validateRouteEndpoints(start, end);
    const apiKey = this.apiKey;
    if (!apiKey) {
      throw new ProviderUnavailableError("ORS_API_KEY not configured");
    }

    const body = JSON.stringify({
      coordinates: [toLngLat(start), toLngLat(end)].map(([lng, lat]) => [roundCoord(lng), roundCoord(lat)]),
    });

    const response = await this.gate.run(() => this.postWithRetry(body, apiKey));
    return parseOrsRoute(await this.readJson(response));
  }

  private async postWithRetry(body: string, apiKey: string): Promise<Response> {
    let lastStatus = 0;
    let lastText = "";

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const response = await this.post(body, apiKey);
      if (response.ok) return response;

      lastStatus = response.status;
      lastText = await response.text().catch(() => "");

      if (!RETRYABLE_STATUSES.has(response.status)) break;
      if (attempt + 1 < this.maxAttempts) {
        const wait = Math.min(this.backoffMaxMs, this.backoffBaseMs * 2 ** attempt);
        console.warn(`[routing] ORS ${response.status}, retrying in ${wait}ms (attempt ${attempt + 1}/${this.maxAttempts})`);
        await sleep(wait);
      }
    }

    throw new ProviderUnavailableError(`ORS error ${lastStatus}: ${lastText.slice(0, 200)}`, lastStatus);
  }

  private async post(body: string, apiKey: string): Promise<Response> {
    try {
      return await fetch(this.url, {
        method: "POST",
        headers: {
          Authorization: apiKey,
          "Content-Type": "application/json",
          Accept: "application/geo+json, application/json",
        },
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
      throw new ProviderUnavailableError(`ORS request failed: ${reason}`);
    }
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      // the request's timeout signal also covers reading the body
      if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        throw new ProviderUnavailableError(`ORS request failed: ${error.name}: ${error.message}`);
      }
      throw new ProviderUnavailableError("ORS returned a non-JSON payload");
    }
  }
}

/** Decode an ORS directions FeatureCollection into a polyline (km / minutes). */
export function parseOrsRoute(payload: unknown): RoutePolyline {
  const parsed = orsResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ProviderUnavailableError("ORS returned an unexpected payload");
  }

  const feature = parsed.data.features[0];
  if (!feature) {
    throw new NoRouteFoundError("ORS returned no route features");
  }

  const summary = feature.properties?.summary;
  const distanceM = summary?.distance ?? 0;
  const durationS = summary?.duration ?? 0;
  if (distanceM <= 0 || durationS <= 0) {
    throw new NoRouteFoundError("ORS returned non-positive distance or duration");
  }

  return {
    points: feature.geometry.coordinates.map(([lng, lat]) => Object.freeze({ lat, lng })),
    distanceKm: distanceM / 1000,
    durationMinutes: durationS / 60,
  };
}
