import axios from "axios";
import type { AxiosInstance } from "axios";
import type { Server } from "http";
import { SignJWT } from "jose";
import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { buildCore } from "../test/fakes";
import type { Core } from "../test/fakes";
import { createApp } from "./app";
import { PubSubHub } from "./realtime/hub";
import { createTokenVerifier } from "./utils/jwt";
import type { AuthUser } from "./utils/jwt";
import { buildWorkers } from "./workers";

const DEVICE_KEY = "test-device-key";

const JWT = {
  alg: "HS256",
  secret: "test-secret",
  publicKey: "",
  issuer: "dc-thermal.auth",
  audience: "dc-thermal.core",
} as const;

const USERS: Record<string, AuthUser> = {
  "admin-token": { userId: "admin-1", role: "admin" },
  "operator-token": { userId: "operator-1", role: "operator" },
  "viewer-token": { userId: "viewer-1", role: "viewer" },
};

// Test names mapped to signed JWTs; any other name is sent as-is.
const tokens = new Map<string, string>();

beforeAll(async () => {
  const key = new TextEncoder().encode(JWT.secret);
  for (const [name, user] of Object.entries(USERS)) {
    const jwt = await new SignJWT({ role: user.role })
      .setProtectedHeader({ alg: "HS256" })
      .setSubject(user.userId)
      .setIssuer(JWT.issuer)
      .setAudience(JWT.audience)
      .setExpirationTime("1h")
      .sign(key);
    tokens.set(name, jwt);
  }
});

let core: Core;
let server: Server;
let http: AxiosInstance;

const bearer = (name: string) => ({ headers: { Authorization: `Bearer ${tokens.get(name) ?? name}` } });
const device = { headers: { "X-API-Key": DEVICE_KEY } };

beforeEach(async () => {
  core = buildCore();
  const app = createApp({
    store: core.store,
    hub: new PubSubHub(),
    ingest: core.ingest,
    sensors: core.sensors,
    readings: core.readings,
    alerts: core.alerts,
    airConditioners: core.airConditioners,
    workers: buildWorkers(core),
    auth: { required: true, verifyToken: createTokenVerifier(JWT), deviceApiKey: DEVICE_KEY },
    serviceName: "dc-thermal-core-test",
  });

  server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("app is not listening on a port");
  http = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
});

afterEach(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

describe("health", () => {
  it("should report the store and subscriber count", async () => {
    const res = await http.get("/health");

    expect(res.status).toBe(200);
    expect(res.data).toMatchObject({ status: "ok", service: "dc-thermal-core-test", db_connected: true, subscribers: 0 });
  });
});

describe("authentication", () => {
  it("should reject a request without a token", async () => {
    const res = await http.get("/api/alerts");

    expect(res.status).toBe(401);
    expect(res.data).toEqual({ ok: false, error: "Unauthorized: missing token", code: "unauthorized" });
  });

  it("should reject an unknown token", async () => {
    const res = await http.get("/api/alerts", bearer("nope"));

    expect(res.status).toBe(401);
    expect(res.data.error).toBe("Unauthorized: invalid token");
  });

  it("should keep viewers off control routes", async () => {
    const res = await http.post("/api/alerts/acknowledge-all", {}, bearer("viewer-token"));

    expect(res.status).toBe(403);
    expect(res.data).toEqual({ ok: false, error: "Role viewer may not perform this action", code: "forbidden" });
  });

  it("should require the device key for ingestion", async () => {
    const res = await http.post("/api/sensors/readings", { device_id: "AA:BB:CC:00:00:01", temperature: 22 });

    expect(res.status).toBe(401);
    expect(res.data.error).toBe("Invalid API key");
  });
});

describe("sensor ingestion", () => {
  it("should store a reading and raise a critical alert", async () => {
    const room = core.store.addRoom();
    const sensor = core.store.addSensor(room.id, { device_id: "AA:BB:CC:00:00:01" });

    const res = await http.post(
      "/api/sensors/readings",
      { device_id: "aa-bb-cc-00-00-01", temperature: 28.0, humidity: 50 },
      device
    );

    expect(res.status).toBe(201);
    expect(res.data.ok).toBe(true);
    expect(res.data.reading).toMatchObject({ sensor_id: sensor.id, temperature: 28, humidity: 50 });

    const alerts = await http.get("/api/alerts", bearer("viewer-token"));
    expect(alerts.data.count).toBe(1);
    expect(alerts.data.alerts[0]).toMatchObject({
      alert_type: "high_temp",
      severity: "critical",
      message: "Critical temperature: 28.0°C (limit: 27.0°C)",
    });
  });

  it("should return 404 for an unknown device", async () => {
    const res = await http.post("/api/sensors/readings", { device_id: "AA:BB:CC:FF:FF:FF", temperature: 22 }, device);

    expect(res.status).toBe(404);
    expect(res.data.code).toBe("sensor_not_found");
  });

  it("should reject out-of-range values", async () => {
    const room = core.store.addRoom();
    core.store.addSensor(room.id, { device_id: "AA:BB:CC:00:00:01" });

    const res = await http.post("/api/sensors/readings", { device_id: "AA:BB:CC:00:00:01", temperature: 150 }, device);

    expect(res.status).toBe(400);
    expect(res.data.code).toBe("validation_error");
    expect(core.store.readingRows).toHaveLength(0);
  });

  it("should reject a malformed body", async () => {
    const res = await http.post("/api/sensors/readings", "{not json", {
      headers: { ...device.headers, "Content-Type": "application/json" },
      transformRequest: [(data: unknown) => data],
    });

    expect(res.status).toBe(400);
    expect(res.data).toEqual({ ok: false, error: "Malformed JSON body", code: "validation_error" });
  });

  it("should give each bulk item its own outcome", async () => {
    const room = core.store.addRoom();
    core.store.addSensor(room.id, { device_id: "AA:BB:CC:00:00:01" });

    const res = await http.post(
      "/api/sensors/readings/bulk",
      {
        readings: [
          { device_id: "AA:BB:CC:00:00:01", temperature: 22.5 },
          { device_id: "AA:BB:CC:00:00:99", temperature: 22.5 },
          { device_id: "AA:BB:CC:00:00:01", temperature: "warm" },
        ],
      },
      device
    );

    expect(res.status).toBe(200);
    expect(res.data).toMatchObject({ ok: true, created: 1, failed: 2 });
    expect(res.data.results.map((r: { ok: boolean; code?: string }) => r.code ?? "ok")).toEqual([
      "ok",
      "sensor_not_found",
      "validation_error",
    ]);
  });

  it("should refuse a duplicate device registration", async () => {
    const room = core.store.addRoom();
    core.store.addSensor(room.id, { device_id: "AA:BB:CC:00:00:01" });

    const res = await http.post(
      "/api/sensors",
      { room_id: room.id, device_id: "aa:bb:cc:00:00:01", name: "Rack 2" },
      bearer("admin-token")
    );

    expect(res.status).toBe(409);
    expect(res.data.code).toBe("duplicate_device_id");
  });
});

describe("rooms", () => {
  it("should update only the settings sent", async () => {
    const room = core.store.addRoom();

    const res = await http.patch(`/api/rooms/${room.id}/settings`, { target_temperature: 24 }, bearer("operator-token"));

    expect(res.status).toBe(200);
    expect(res.data.settings).toEqual({
      room_id: room.id,
      name: "Server Room A",
      target_temperature: 24,
      target_humidity: 50,
      operation_mode: "automatic",
    });
  });

  it("should reject an empty settings patch", async () => {
    const room = core.store.addRoom();

    const res = await http.patch(`/api/rooms/${room.id}/settings`, {}, bearer("operator-token"));

    expect(res.status).toBe(400);
    expect(res.data.code).toBe("validation_error");
  });

  it("should return 404 for an unknown room", async () => {
    const res = await http.get("/api/rooms/6a0f1c2e-3b4d-4e5f-8a9b-0c1d2e3f4a5b/settings", bearer("viewer-token"));

    expect(res.status).toBe(404);
    expect(res.data.code).toBe("room_not_found");
  });
});

describe("air conditioners", () => {
  it("should turn a unit on and report the new status", async () => {
    const room = core.store.addRoom();
    const ac = core.store.addAirConditioner(room.id, { ir_code: { power_on: "0xA1" } });

    const res = await http.post(`/api/air-conditioners/${ac.id}/turn-on`, {}, bearer("operator-token"));

    expect(res.status).toBe(200);
    expect(res.data.message).toBe("AC 1 turned on");
    expect(res.data.data.status).toBe("on");
    expect(core.store.commandLogRows[0]).toMatchObject({ executed_by: "operator-1", automatic: false, success: true });
  });

  it("should answer 502 when the transmitter fails", async () => {
    const room = core.store.addRoom();
    const ac = core.store.addAirConditioner(room.id, { ir_code: { power_on: "0xA1" } });
    core.transmitter.failNext();

    const res = await http.post(`/api/air-conditioners/${ac.id}/turn-on`, {}, bearer("operator-token"));

    expect(res.status).toBe(502);
    expect(res.data).toEqual({ ok: false, error: "Failed to turn on AC 1", code: "command_failed" });
  });

  it("should return 404 for an unknown unit", async () => {
    const res = await http.get("/api/air-conditioners/6a0f1c2e-3b4d-4e5f-8a9b-0c1d2e3f4a5b", bearer("viewer-token"));

    expect(res.status).toBe(404);
    expect(res.data.code).toBe("air_conditioner_not_found");
  });

  it("should store a learned IR frame reported by the transmitter", async () => {
    const room = core.store.addRoom();
    const ac = core.store.addAirConditioner(room.id);

    const res = await http.post(
      `/api/air-conditioners/${ac.id}/ir-signal`,
      { command_type: "power_off", raw_signal: "0xB2", protocol: "NEC" },
      device
    );

    expect(res.status).toBe(200);
    expect(core.store.acRows.get(ac.id)?.ir_code).toEqual({ power_off: "0xB2" });
  });
});

describe("alerts", () => {
  it("should acknowledge once and refuse a second time", async () => {
    const room = core.store.addRoom();
    const alert = core.store.addAlert(room.id);

    const first = await http.post(`/api/alerts/${alert.id}/acknowledge`, {}, bearer("operator-token"));
    const second = await http.post(`/api/alerts/${alert.id}/acknowledge`, {}, bearer("operator-token"));

    expect(first.status).toBe(200);
    expect(first.data.alert).toMatchObject({ is_acknowledged: true, acknowledged_by: "operator-1" });
    expect(second.status).toBe(409);
    expect(second.data.code).toBe("already_acknowledged");
  });

  it("should return 404 for an unknown alert", async () => {
    const res = await http.post(
      "/api/alerts/6a0f1c2e-3b4d-4e5f-8a9b-0c1d2e3f4a5b/acknowledge",
      {},
      bearer("operator-token")
    );

    expect(res.status).toBe(404);
    expect(res.data.code).toBe("alert_not_found");
  });
});

describe("workers", () => {
  it("should run a worker on demand and list the run", async () => {
    const run = await http.post("/api/workers/alert-cleanup/run", {}, bearer("admin-token"));

    expect(run.status).toBe(200);
    expect(run.data).toMatchObject({ worker: "alert-cleanup", ok: true, summary: { deleted_count: 0 } });

    const logs = await http.get("/api/workers/logs", bearer("admin-token"));
    expect(logs.data.count).toBe(1);
    expect(logs.data.runs[0]).toMatchObject({ worker_name: "alert-cleanup", status: "success" });
  });

  it("should return 404 for an unknown worker", async () => {
    const res = await http.post("/api/workers/heartbeat/run", {}, bearer("admin-token"));

    expect(res.status).toBe(404);
    expect(res.data.code).toBe("worker_not_found");
  });

  it("should be admin only", async () => {
    const res = await http.get("/api/workers/logs", bearer("operator-token"));

    expect(res.status).toBe(403);
  });
});

describe("fallback", () => {
  it("should answer unknown routes with a JSON 404", async () => {
    const res = await http.get("/api/nowhere");

    expect(res.status).toBe(404);
    expect(res.data).toEqual({ ok: false, error: "Cannot GET /api/nowhere", code: "not_found" });
  });
});
