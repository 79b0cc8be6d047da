import type { Coordinate, RoutePolyline } from "../types";
import { coordinateKey, validateRouteEndpoints } from "../utils/coordinates";
import { LruCache } from "../utils/lru-cache";
import type { RouteProvider } from "./routing";

/**
 * Memoizes a provider by (start, end), rounded to 5 decimals. Entries leave
 * only by capacity eviction. Concurrent requests for the same pair share one
 * provider call, and a failed call is never cached.
 */
export class CachedRouteProvider implements RouteProvider {
  private readonly cache: LruCache<string, RoutePolyline>;
  private readonly inFlight = new Map<string, Promise<RoutePolyline>>();

  constructor(private readonly inner: RouteProvider, maxEntries = 256) {
    this.cache = new LruCache(maxEntries);
  }

  get name(): string {
    return this.inner.name;
  }

  get size(): number {
    return this.cache.size;
  }

  getRoute(start: Coordinate, end: Coordinate): Promise<RoutePolyline> {
    try {
      validateRouteEndpoints(start, end);
    } catch (error) {
      return Promise.reject(error);
    }
    const key = routeKey(start, end);

    const hit = this.cache.get(key);
    if (hit) return Promise.resolve(hit);

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const call = this.inner
      .getRoute(start, end)
      .then((route) => {
        this.cache.set(key, route);
        return route;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, call);
    return call;
  }
}

export function routeKey(start: Coordinate, end: Coordinate): string {
  return `${coordinateKey(start)}->${coordinateKey(end)}`;
}
