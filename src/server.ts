import http from "http";
import { createApp } from "./app";
import { HttpIrTransmitter } from "./adapters/irTransmitter";
import { WebhookEscalationSink } from "./adapters/escalationWebhook";
import { cfg, settingsFromConfig } from "./config";
import { startCronJobs } from "./cron";
import { ensureSchema } from "./db/ensureSchema";
import { PgThermalStore } from "./db/pgStore";
import { createPool } from "./db/pool";
import { errorMessage } from "./errors";
import { PubSubHub } from "./realtime/hub";
import { Notifier } from "./realtime/notifier";
import { attachRealtimeServer } from "./realtime/websocketServer";
import { AirConditionerService } from "./services/acService";
import { AlertService } from "./services/alertService";
import { IngestService } from "./services/ingestService";
import { ReadingService } from "./services/readingService";
import { SensorService } from "./services/sensorService";
import { createTokenVerifier } from "./utils/jwt";
import { logger } from "./utils/logger";
import { buildWorkers } from "./workers";

const log = logger.child({ module: "server" });

async function main(): Promise<void> {
  const settings = settingsFromConfig(cfg);

  if (!cfg.AUTH_REQUIRED) log.warn("⚠️ AUTH_REQUIRED=false: every caller is treated as admin");
  else if (!cfg.DEVICE_API_KEY) log.warn("⚠️ DEVICE_API_KEY not set: sensor posts will fail auth!");
  if (!cfg.IR_GATEWAY_URL) log.warn("⚠️ IR_GATEWAY_URL not set: AC commands with recorded IR codes will fail");

  const pool = createPool(cfg.DATABASE_URL);
  await ensureSchema(pool);

  const store = new PgThermalStore(pool);
  const hub = new PubSubHub();
  const notifier = new Notifier(hub);

  const alerts = new AlertService({
    store,
    notifier,
    settings,
    escalation: cfg.ESCALATION_WEBHOOK_URL ? new WebhookEscalationSink(cfg.ESCALATION_WEBHOOK_URL) : undefined,
  });
  const airConditioners = new AirConditionerService({
    store,
    transmitter: new HttpIrTransmitter({ baseUrl: cfg.IR_GATEWAY_URL, timeoutMs: cfg.IR_COMMAND_TIMEOUT_MS }),
    alerts,
    notifier,
    settings,
  });
  const sensors = new SensorService({ store, alerts, notifier, settings });
  const readings = new ReadingService({ store, settings });
  const ingest = new IngestService({ store, sensors, alerts, airConditioners, notifier });
  const workers = buildWorkers({ sensors, readings, airConditioners, alerts });

  const verifyToken = createTokenVerifier({
    alg: cfg.CORE_JWT_ALG,
    secret: cfg.CORE_JWT_SECRET,
    publicKey: cfg.CORE_JWT_PUBLIC_KEY,
    issuer: cfg.CORE_JWT_ISS,
    audience: cfg.CORE_JWT_AUD,
  });

  const app = createApp({
    store,
    hub,
    ingest,
    sensors,
    readings,
    alerts,
    airConditioners,
    workers,
    auth: { required: cfg.AUTH_REQUIRED, verifyToken, deviceApiKey: cfg.DEVICE_API_KEY },
    serviceName: cfg.SERVICE_NAME,
  });

  const server = http.createServer(app);
  const realtime = attachRealtimeServer(server, {
    hub,
    rooms: store.rooms,
    authRequired: cfg.AUTH_REQUIRED,
    verifyToken,
  });

  await new Promise<void>((resolve) => server.listen(cfg.PORT, resolve));
  log.info({ port: cfg.PORT }, `🚀 ${cfg.SERVICE_NAME} running on port ${cfg.PORT}`);

  const tasks = cfg.ENABLE_CRON ? startCronJobs(workers, store.workerRuns) : [];

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, "Shutting down...");

    for (const task of tasks) task.stop();
    await realtime.close();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await pool.end();
    log.info("👋 Shutdown complete");
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          log.error({ err: errorMessage(err) }, "Shutdown failed");
          process.exit(1);
        });
    });
  }
}

main().catch((err: unknown) => {
  log.fatal({ err: errorMessage(err) }, "❌ Startup failed");
  process.exit(1);
});
