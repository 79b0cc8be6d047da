import { Router } from "express";

export type HealthInfo = {
  provider: string;
  providerKeyPresent: boolean;
};

export function createHealthRouter(info: HealthInfo): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      provider: info.provider,
      ors_key_present: info.providerKeyPresent,
    });
  });

  return router;
}
