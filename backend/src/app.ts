import cors from "cors";
import express from "express";
import { createFloodZonesRouter } from "./routes/flood-zones";
import { createHealthRouter } from "./routes/health";
import { createOptimizeRouteRouter } from "./routes/optimize-route";
import { RouteOptimizer } from "./services/optimizer";
import type { RouteProvider } from "./services/routing";
import type { FloodZoneStore } from "./store";

export type AppDeps = {
  store: FloodZoneStore;
  provider: RouteProvider;
  providerKeyPresent: boolean;
  corsOrigin?: string;
};

export function createApp({ store, provider, providerKeyPresent, corsOrigin = "*" }: AppDeps) {
  const app = express();
  const optimizer = new RouteOptimizer(provider, store);

  app.use(cors({ origin: corsOrigin }));
  app.use(express.json({ limit: "1mb" }));

  app.use(createHealthRouter({ provider: provider.name, providerKeyPresent }));
  app.use(createFloodZonesRouter(store));
  app.use(createOptimizeRouteRouter(optimizer));

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }
    console.error("Unhandled error:", error);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
