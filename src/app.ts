import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import cors from "cors";
import bodyParser from "body-parser";
import type { ThermalStore } from "./db/store";
import { AppError } from "./errors";
import { createRequireAuth, createRequireDevice, requireRole } from "./middleware/auth";
import type { AuthOptions } from "./middleware/auth";
import type { PubSubHub } from "./realtime/hub";
import type { AirConditionerService } from "./services/acService";
import type { AlertService } from "./services/alertService";
import type { IngestService } from "./services/ingestService";
import type { ReadingService } from "./services/readingService";
import type { SensorService } from "./services/sensorService";
import { logger } from "./utils/logger";
import type { WorkerRegistry } from "./workers";

// Routes
import { createAirConditionersRouter } from "./routes/airConditioners";
import { createAlertsRouter } from "./routes/alerts";
import { createHealthRouter } from "./routes/health";
import { createRoomsRouter } from "./routes/rooms";
import { createSensorsRouter } from "./routes/sensors";
import { createWorkersRouter } from "./routes/workers";

const log = logger.child({ module: "http" });

export type AppDeps = {
  store: ThermalStore;
  hub: PubSubHub;
  ingest: IngestService;
  sensors: SensorService;
  readings: ReadingService;
  alerts: AlertService;
  airConditioners: AirConditionerService;
  workers: WorkerRegistry;
  auth: AuthOptions;
  serviceName: string;
};

function hasType(err: unknown): err is { type: unknown } {
  return typeof err === "object" && err !== null && "type" in err;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  const requireAuth = createRequireAuth(deps.auth);
  const requireDevice = createRequireDevice(deps.auth);
  const requireAdmin = requireRole("admin");
  const requireOperator = requireRole("admin", "operator");

  app.use(cors());
  app.use(bodyParser.json({ limit: "1mb" }));

  /* ------------------------- Logging middleware -------------------------- */
  app.use((req, _res, next) => {
    if (req.path.startsWith("/api")) log.info({ method: req.method, path: req.path, ip: req.ip }, "➡️  request");
    next();
  });

  /* --------------------------- Register routes --------------------------- */
  app.use("/health", createHealthRouter({ store: deps.store, hub: deps.hub, serviceName: deps.serviceName }));
  app.use(
    "/api/sensors",
    createSensorsRouter({
      ingest: deps.ingest,
      sensors: deps.sensors,
      readings: deps.readings,
      requireDevice,
      requireAuth,
      requireAdmin,
    })
  );
  app.use("/api/rooms", createRoomsRouter({ store: deps.store, sensors: deps.sensors, requireAuth, requireOperator }));
  app.use(
    "/api/air-conditioners",
    createAirConditionersRouter({
      store: deps.store,
      airConditioners: deps.airConditioners,
      requireDevice,
      requireAuth,
      requireOperator,
    })
  );
  app.use("/api/alerts", createAlertsRouter({ alerts: deps.alerts, requireAuth, requireOperator }));
  app.use(
    "/api/workers",
    createWorkersRouter({ workers: deps.workers, runs: deps.store.workerRuns, requireAuth, requireAdmin })
  );

  app.use((req, res) => {
    res.status(404).json({ ok: false, error: `Cannot ${req.method} ${req.path}`, code: "not_found" });
  });

  /* --------------------------- Global Error Trap -------------------------- */
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AppError) {
      if (err.status >= 500) log.error({ path: req.path, code: err.code, err: err.message }, "Request failed");
      res.status(err.status).json({
        ok: false,
        error: err.message,
        code: err.code,
        ...(err.details !== undefined ? { details: err.details } : {}),
      });
      return;
    }

    if (hasType(err) && err.type === "entity.parse.failed") {
      res.status(400).json({ ok: false, error: "Malformed JSON body", code: "validation_error" });
      return;
    }

    log.error({ path: req.path, err }, "💥 Uncaught server error");
    res.status(500).json({ ok: false, error: "Internal server error", code: "server_error" });
  });

  return app;
}
