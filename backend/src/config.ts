import dotenv from "dotenv";
import path from "path";
import { z } from "zod";

dotenv.config();

const PROJECT_ROOT = process.cwd();

const schema = z
  .object({
    PORT: z.coerce.number().int().positive().default(8000),
    CORS_ORIGIN: z.string().default("*"),
    DATA_DIR: z.string().default(path.join(PROJECT_ROOT, "data")),
    FLOOD_ZONES_PATH: z.string().optional(),
    ORS_API_KEY: z.string().optional(),
    ORS_BASE_URL: z.string().url().default("https://api.openrouteservice.org"),
    ORS_PROFILE: z.string().default("driving-car"),
    ORS_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
    ORS_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(5),
    ORS_MAX_CONCURRENCY: z.coerce.number().int().min(1).default(1),
    ROUTE_CACHE_SIZE: z.coerce.number().int().min(1).default(256),
  })
  .transform((env) => ({
    ...env,
    FLOOD_ZONES_PATH: env.FLOOD_ZONES_PATH ?? path.join(env.DATA_DIR, "flood_prone.geojson"),
    ORS_API_KEY: env.ORS_API_KEY || null,
  }));

const parsed = schema.safeParse(process.env);

if (!parsed.success) {
  console.error("Invalid environment configuration:", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const config = parsed.data;
export type Config = typeof config;
