import { Router } from "express";
import { z } from "zod";
import { RouteOptimizer, toRouteResponse } from "../services/optimizer";
import { coordinateSchema } from "../utils/coordinates";
import { sendError } from "../utils/http";

const optimizeRouteSchema = z.object({
  start: coordinateSchema,
  end: coordinateSchema,
});

export function createOptimizeRouteRouter(optimizer: RouteOptimizer): Router {
  const router = Router();

  router.post("/optimize-route", async (req, res) => {
    try {
      const { start, end } = optimizeRouteSchema.parse(req.body);
      const t0 = Date.now();
      const result = await optimizer.optimize(start, end);
      console.log(
        `[optimize-route] ${result.routeId}: ${result.assessment.intersectionCount} intersections, ` +
          `score ${result.assessment.riskScore} (${Date.now() - t0}ms)`
      );
      res.json(toRouteResponse(result));
    } catch (error) {
      sendError(res, error, "optimize-route");
    }
  });

  return router;
}
