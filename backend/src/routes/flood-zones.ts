import { Router } from "express";
import type { FloodZoneStore } from "../store";

export function createFloodZonesRouter(store: FloodZoneStore): Router {
  const router = Router();
  // Zones never change after startup, so the body is built once.
  const body = store.toFeatureCollection();

  router.get("/flood-zones", (_req, res) => {
    res.json(body);
  });

  return router;
}
