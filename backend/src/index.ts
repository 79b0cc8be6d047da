import { createApp } from "./app";
import { config } from "./config";
import { CachedRouteProvider } from "./services/route-cache";
import { OrsRouteProvider } from "./services/routing";
import { FloodZoneStore } from "./store";

function start() {
  const store = FloodZoneStore.load(config.FLOOD_ZONES_PATH);

  if (!config.ORS_API_KEY) {
    console.warn("ORS_API_KEY is not set; /optimize-route will answer 502 until it is.");
  }

  const provider = new CachedRouteProvider(
    new OrsRouteProvider({
      apiKey: config.ORS_API_KEY,
      baseUrl: config.ORS_BASE_URL,
      profile: config.ORS_PROFILE,
      timeoutMs: config.ORS_TIMEOUT_MS,
      maxAttempts: config.ORS_MAX_ATTEMPTS,
      maxConcurrency: config.ORS_MAX_CONCURRENCY,
    }),
    config.ROUTE_CACHE_SIZE
  );

  const app = createApp({
    store,
    provider,
    providerKeyPresent: Boolean(config.ORS_API_KEY),
    corsOrigin: config.CORS_ORIGIN,
  });

  app.listen(config.PORT, () => {
    console.log(`API listening on http://localhost:${config.PORT}`);
  });
}

try {
  start();
} catch (error) {
  console.error("Failed to start API:", error);
  process.exit(1);
}
