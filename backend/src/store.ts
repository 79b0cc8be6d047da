import * as fs from "fs";
import type { Feature, FeatureCollection, MultiPolygon, Polygon, Position } from "geojson";
import { z } from "zod";
import { DataLoadError } from "./errors";
import type { FloodZone } from "./types";
import { describeCoordinateProblem } from "./utils/coordinates";

/* ── Source schema ── */

const positionSchema = z.array(z.number()).min(2);
const ringSchema = z.array(positionSchema);

const polygonSchema = z.object({
  type: z.literal("Polygon"),
  coordinates: z.array(ringSchema),
});

const multiPolygonSchema = z.object({
  type: z.literal("MultiPolygon"),
  coordinates: z.array(z.array(ringSchema)),
});

const polygonalSchema = z.discriminatedUnion("type", [polygonSchema, multiPolygonSchema]);

const featureSchema = z.object({
  type: z.literal("Feature"),
  id: z.union([z.string(), z.number()]).optional(),
  properties: z.record(z.unknown()).nullable().optional(),
  geometry: z.object({ type: z.string() }).passthrough().nullable(),
});

const collectionSchema = z.object({
  type: z.literal("FeatureCollection"),
  crs: z
    .object({ properties: z.object({ name: z.string() }).passthrough() })
    .passthrough()
    .optional(),
  features: z.array(featureSchema),
});

// Names GeoJSON writers use for plain lng/lat degrees.
const WGS84_CRS_NAMES = new Set([
  "urn:ogc:def:crs:OGC:1.3:CRS84",
  "urn:ogc:def:crs:EPSG::4326",
  "EPSG:4326",
]);

/* ── Store ── */

/**
 * Read-only set of flood-prone polygons, loaded once at startup and shared by
 * every request.
 */
export class FloodZoneStore {
  private readonly zones: readonly FloodZone[];

  constructor(zones: FloodZone[]) {
    this.zones = Object.freeze(zones.map(freezeZone));
  }

  static load(sourcePath: string): FloodZoneStore {
    console.log(`[store] Loading flood zones from ${sourcePath}...`);

    let raw: string;
    try {
      raw = fs.readFileSync(sourcePath, "utf-8");
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DataLoadError(`Cannot read flood-zone file ${sourcePath}: ${reason}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DataLoadError(`Flood-zone file ${sourcePath} is not valid JSON: ${reason}`);
    }

    const store = FloodZoneStore.fromGeoJson(json);
    console.log(`[store]   Loaded ${store.size} flood zones`);
    return store;
  }

  static fromGeoJson(json: unknown): FloodZoneStore {
    const parsed = collectionSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new DataLoadError(
        `Flood-zone source is not a GeoJSON FeatureCollection: ${issue.path.join(".") || "(root)"} ${issue.message}`
      );
    }

    const crsName = parsed.data.crs?.properties.name;
    if (crsName !== undefined && !WGS84_CRS_NAMES.has(crsName)) {
      throw new DataLoadError(`Flood-zone source uses CRS ${crsName}; expected WGS84 (EPSG:4326)`);
    }

    const zones: FloodZone[] = [];
    const seenIds = new Set<string>();

    parsed.data.features.forEach((feature, index) => {
      const props = feature.properties ?? {};
      const id = zoneId(feature.id, props.id, index);

      if (!feature.geometry) {
        console.warn(`[store] Skipping zone ${id}: empty geometry`);
        return;
      }

      const geometry = polygonalSchema.safeParse(feature.geometry);
      if (!geometry.success) {
        if (feature.geometry.type !== "Polygon" && feature.geometry.type !== "MultiPolygon") {
          console.warn(`[store] Skipping zone ${id}: unsupported geometry ${feature.geometry.type}`);
          return;
        }
        throw new DataLoadError(`Flood zone ${id} has malformed ${feature.geometry.type} coordinates`);
      }

      for (const position of positionsOf(geometry.data)) {
        const problem = describeCoordinateProblem(position[1], position[0]);
        if (problem) throw new DataLoadError(`Flood zone ${id}: ${problem}`);
      }

      if (seenIds.has(id)) {
        throw new DataLoadError(`Duplicate flood zone id ${id}`);
      }
      seenIds.add(id);

      zones.push({
        id,
        name: typeof props.name === "string" ? props.name : null,
        geometry: geometry.data,
        properties: props,
      });
    });

    return new FloodZoneStore(zones);
  }

  all(): readonly FloodZone[] {
    return this.zones;
  }

  get size(): number {
    return this.zones.length;
  }

  toFeatureCollection(): FeatureCollection<Polygon | MultiPolygon> {
    const features: Feature<Polygon | MultiPolygon>[] = this.zones.map((zone) => ({
      type: "Feature",
      id: zone.id,
      geometry: zone.geometry,
      properties: { ...zone.properties },
    }));
    return { type: "FeatureCollection", features };
  }
}

function zoneId(featureId: string | number | undefined, propId: unknown, index: number): string {
  if (featureId !== undefined) return String(featureId);
  if (typeof propId === "string" || typeof propId === "number") return String(propId);
  return `zone-${index}`;
}

function positionsOf(geometry: Polygon | MultiPolygon): Position[] {
  const polygons = geometry.type === "Polygon" ? [geometry.coordinates] : geometry.coordinates;
  return polygons.flat(2);
}

function freezeZone(zone: FloodZone): FloodZone {
  return Object.freeze({
    ...zone,
    geometry: freezeGeometry(zone.geometry),
    properties: Object.freeze({ ...zone.properties }),
  });
}

function freezeGeometry(geometry: Polygon | MultiPolygon): Polygon | MultiPolygon {
  const copy = structuredClone(geometry);
  freezeNested(copy.coordinates);
  return Object.freeze(copy);
}

function freezeNested(value: unknown) {
  if (!Array.isArray(value)) return;
  for (const item of value) freezeNested(item);
  Object.freeze(value);
}
