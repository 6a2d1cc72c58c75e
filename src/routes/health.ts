import express from "express";
import type { Request, Response, Router } from "express";
import type { ThermalStore } from "../db/store";
import { errorMessage } from "../errors";
import type { PubSubHub } from "../realtime/hub";
import { logger } from "../utils/logger";

const log = logger.child({ module: "routes/health" });

export type HealthRouterDeps = {
  store: ThermalStore;
  hub: PubSubHub;
  serviceName: string;
};

export function createHealthRouter(deps: HealthRouterDeps): Router {
  const router = express.Router();

  router.get("/", async (_req: Request, res: Response) => {
    try {
      const dbTime = await deps.store.ping();
      res.status(200).json({
        status: "ok",
        service: deps.serviceName,
        db_connected: true,
        db_time: dbTime,
        subscribers: deps.hub.subscriberCount(),
        uptime_seconds: process.uptime(),
        timestamp: new Date().toISOString(),
      });
    } catch (err) {
      log.error({ err: errorMessage(err) }, "Health check failed");
      res.status(503).json({
        status: "error",
        db_connected: false,
        message: errorMessage(err),
      });
    }
  });

  return router;
}
