import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { DataLoadError } from "./errors";
import { FloodZoneStore } from "./store";

const square = [
  [
    [120.44, 14.49],
    [120.47, 14.49],
    [120.47, 14.52],
    [120.44, 14.52],
    [120.44, 14.49],
  ],
];

function collection(features: unknown[], extra: Record<string, unknown> = {}) {
  return { type: "FeatureCollection", ...extra, features };
}

function polygonFeature(id: string | undefined, properties: Record<string, unknown> | null = {}) {
  return {
    type: "Feature",
    ...(id === undefined ? {} : { id }),
    properties,
    geometry: { type: "Polygon", coordinates: square },
  };
}

describe("FloodZoneStore", () => {
  let tmpDir: string;

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "flood-zones-"));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeSource(contents: string): string {
    const file = path.join(tmpDir, "zones.geojson");
    fs.writeFileSync(file, contents);
    return file;
  }

  describe("load", () => {
    it("loads the bundled flood-zone file", () => {
      const store = FloodZoneStore.load(path.join(__dirname, "../../data/flood_prone.geojson"));

      expect(store.size).toBe(8);
      expect(store.all()[0].id).toBe("BTN-FH-001");
      expect(store.all()[0].name).toBe("Orani coastal lowland");
      expect(store.all()[0].properties).toEqual({ name: "Orani coastal lowland", return_period: "5yr" });
    });

    it("fails on a missing file", () => {
      expect(() => FloodZoneStore.load(path.join(tmpDir, "missing.geojson"))).toThrow(DataLoadError);
    });

    it("fails on a file that is not JSON", () => {
      const file = writeSource("{ not json");

      expect(() => FloodZoneStore.load(file)).toThrow(/is not valid JSON/);
    });

    it("reads a valid file from disk", () => {
      const file = writeSource(JSON.stringify(collection([polygonFeature("z1")])));

      expect(FloodZoneStore.load(file).all().map((z) => z.id)).toEqual(["z1"]);
    });
  });

  describe("fromGeoJson", () => {
    it("rejects anything but a FeatureCollection", () => {
      expect(() => FloodZoneStore.fromGeoJson({ type: "Feature" })).toThrow(DataLoadError);
      expect(() => FloodZoneStore.fromGeoJson([])).toThrow(DataLoadError);
    });

    it("rejects a position outside coordinate bounds", () => {
      const feature = {
        type: "Feature",
        id: "z1",
        properties: {},
        geometry: { type: "Polygon", coordinates: [[[200, 14], [120, 14], [120, 15], [200, 14]]] },
      };

      expect(() => FloodZoneStore.fromGeoJson(collection([feature]))).toThrow(
        "Flood zone z1: longitude 200 is outside [-180, 180]"
      );
    });

    it("rejects malformed polygon coordinates", () => {
      const feature = { type: "Feature", id: "z1", properties: {}, geometry: { type: "Polygon", coordinates: "nope" } };

      expect(() => FloodZoneStore.fromGeoJson(collection([feature]))).toThrow(
        "Flood zone z1 has malformed Polygon coordinates"
      );
    });

    it("rejects a projected CRS", () => {
      const source = collection([polygonFeature("z1")], {
        crs: { type: "name", properties: { name: "urn:ogc:def:crs:EPSG::32651" } },
      });

      expect(() => FloodZoneStore.fromGeoJson(source)).toThrow(
        "Flood-zone source uses CRS urn:ogc:def:crs:EPSG::32651; expected WGS84 (EPSG:4326)"
      );
    });

    it("accepts an explicit WGS84 CRS", () => {
      const source = collection([polygonFeature("z1")], {
        crs: { type: "name", properties: { name: "urn:ogc:def:crs:OGC:1.3:CRS84" } },
      });

      expect(FloodZoneStore.fromGeoJson(source).size).toBe(1);
    });

    it("rejects duplicate zone ids", () => {
      expect(() => FloodZoneStore.fromGeoJson(collection([polygonFeature("z1"), polygonFeature("z1")]))).toThrow(
        "Duplicate flood zone id z1"
      );
    });

    it("skips empty and non-polygonal geometries", () => {
      const store = FloodZoneStore.fromGeoJson(
        collection([
          { type: "Feature", id: "empty", properties: {}, geometry: null },
          { type: "Feature", id: "point", properties: {}, geometry: { type: "Point", coordinates: [120.5, 14.5] } },
          polygonFeature("kept"),
        ])
      );

      expect(store.all().map((z) => z.id)).toEqual(["kept"]);
      expect(console.warn).toHaveBeenCalledWith("[store] Skipping zone empty: empty geometry");
      expect(console.warn).toHaveBeenCalledWith("[store] Skipping zone point: unsupported geometry Point");
    });

    it("falls back to properties.id and then the feature index for ids", () => {
      const store = FloodZoneStore.fromGeoJson(
        collection([polygonFeature(undefined, { id: 42 }), polygonFeature(undefined, null)])
      );

      expect(store.all().map((z) => z.id)).toEqual(["42", "zone-1"]);
      expect(store.all()[1].name).toBeNull();
    });

    it("keeps multipolygons", () => {
      const feature = {
        type: "Feature",
        id: "m",
        properties: { name: "Two parts" },
        geometry: { type: "MultiPolygon", coordinates: [square, square] },
      };
      const zone = FloodZoneStore.fromGeoJson(collection([feature])).all()[0];

      expect(zone.geometry.type).toBe("MultiPolygon");
      expect(zone.name).toBe("Two parts");
    });
  });

  it("exposes a frozen view of the zones", () => {
    const store = FloodZoneStore.fromGeoJson(collection([polygonFeature("z1", { name: "A" })]));

    expect(Object.isFrozen(store.all())).toBe(true);
    expect(Object.isFrozen(store.all()[0])).toBe(true);
    expect(store.all()).toBe(store.all());
  });

  it("freezes zone geometry down to each position", () => {
    const source = collection([polygonFeature("z1")]);
    const zone = FloodZoneStore.fromGeoJson(source).all()[0];
    const coordinates = zone.geometry.type === "Polygon" ? zone.geometry.coordinates : [];

    expect(Object.isFrozen(zone.geometry)).toBe(true);
    expect(Object.isFrozen(coordinates)).toBe(true);
    expect(Object.isFrozen(coordinates[0])).toBe(true);
    expect(Object.isFrozen(coordinates[0][0])).toBe(true);
    expect(() => {
      coordinates[0][0][0] = 999;
    }).toThrow(TypeError);
    expect(coordinates[0][0][0]).toBe(120.44);
  });

  it("does not share geometry with the source document", () => {
    const source = collection([polygonFeature("z1")]);
    const zone = FloodZoneStore.fromGeoJson(source).all()[0];
    square[0][0][0] = 0;

    try {
      expect(zone.geometry.coordinates[0]).not.toBe(square[0]);
      expect(zone.geometry.type === "Polygon" && zone.geometry.coordinates[0][0][0]).toBe(120.44);
    } finally {
      square[0][0][0] = 120.44;
    }
  });

  it("serializes back to a FeatureCollection", () => {
    const store = FloodZoneStore.fromGeoJson(collection([polygonFeature("z1", { name: "A", var: 2 })]));

    expect(store.toFeatureCollection()).toEqual({
      type: "FeatureCollection",
      features: [
        {
          type: "Feature",
          id: "z1",
          properties: { name: "A", var: 2 },
          geometry: { type: "Polygon", coordinates: square },
        },
      ],
    });
  });
});
