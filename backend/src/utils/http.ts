import type { Response } from "express";
import { z } from "zod";
import { AppError } from "../errors";

/** Answer a failed request: zod issues → 400, AppError → its own status, anything else → 500. */
export function sendError(res: Response, error: unknown, tag: string): void {
  if (error instanceof z.ZodError) {
    res.status(400).json({ error: "Invalid request", details: error.issues });
    return;
  }
  if (error instanceof AppError) {
    if (error.status >= 500) console.error(`[${tag}] ${error.name}: ${error.message}`);
    res.status(error.status).json({ error: error.message, code: error.code });
    return;
  }
  console.error(`[${tag}] Error:`, error);
  res.status(500).json({
    error: error instanceof Error ? error.message : "Internal server error",
  });
}
