// routes/sensors.ts
import express from 'express';
import type { RequestHandler, Router } from 'express';
import type { IngestService } from '../services/ingestService';
import type { ReadingService } from '../services/readingService';
import type { SensorService } from '../services/sensorService';
import { asyncHandler } from '../utils/asyncHandler';
import { logger } from '../utils/logger';
import {
  BulkReadingsBody,
  ReadingItem,
  ReadingsQuery,
  RegisterSensorBody,
  RoomQuery,
  Uuid,
  parseOrThrow,
} from '../validators';

const log = logger.child({ module: 'routes/sensors' });

export type SensorsRouterDeps = {
  ingest: IngestService;
  sensors: SensorService;
  readings: ReadingService;
  requireDevice: RequestHandler;
  requireAuth: RequestHandler;
  requireAdmin: RequestHandler;
};

export function createSensorsRouter(deps: SensorsRouterDeps): Router {
  const router = express.Router();
  const { ingest, sensors, readings, requireDevice, requireAuth, requireAdmin } = deps;

  /**
   * POST /api/sensors/readings
   * ESP32 reading submission, identified by device_id or sensor_id.
   */
  router.post(
    '/readings',
    requireDevice,
    asyncHandler(async (req, res) => {
      const input = parseOrThrow(ReadingItem, req.body);
      const reading = await ingest.submitReading(input);
      res.status(201).json({ ok: true, reading });
    })
  );

  /**
   * POST /api/sensors/readings/bulk
   * Up to 500 readings; every item gets its own outcome.
   */
  router.post(
    '/readings/bulk',
    requireDevice,
    asyncHandler(async (req, res) => {
      const { readings: items } = parseOrThrow(BulkReadingsBody, req.body);
      const result = await ingest.submitReadingsBulk(items);
      log.info({ received: items.length, created: result.created, failed: result.failed }, '📥 Bulk readings processed');
      res.status(200).json({ ok: true, ...result });
    })
  );

  /**
   * POST /api/sensors/:sensorId/readings
   * Same as /readings with the sensor taken from the path.
   */
  router.post(
    '/:sensorId/readings',
    requireDevice,
    asyncHandler(async (req, res) => {
      const sensorId = parseOrThrow(Uuid, req.params.sensorId);
      const input = parseOrThrow(ReadingItem, req.body);
      const reading = await ingest.submitReading({ ...input, sensor_id: sensorId, device_id: undefined });
      res.status(201).json({ ok: true, reading });
    })
  );

  /**
   * POST /api/sensors
   * Registers a sensor in a room (admin only).
   */
  router.post(
    '/',
    requireAuth,
    requireAdmin,
    asyncHandler(async (req, res) => {
      const body = parseOrThrow(RegisterSensorBody, req.body);
      const sensor = await sensors.registerSensor(body);
      res.status(201).json({ ok: true, sensor });
    })
  );

  /**
   * GET /api/sensors/latest?room_id=
   * Most recent reading of every sensor.
   */
  router.get(
    '/latest',
    requireAuth,
    asyncHandler(async (req, res) => {
      const { room_id } = parseOrThrow(RoomQuery, req.query);
      const rows = await readings.latestPerSensor(room_id);
      res.json({ ok: true, count: rows.length, readings: rows });
    })
  );

  router.get(
    '/:sensorId/readings/latest',
    requireAuth,
    asyncHandler(async (req, res) => {
      const sensorId = parseOrThrow(Uuid, req.params.sensorId);
      const reading = await readings.latestForSensor(sensorId);
      res.json({ ok: true, reading });
    })
  );

  /**
   * GET /api/sensors/:sensorId/readings?start_date&end_date&limit
   * Newest first.
   */
  router.get(
    '/:sensorId/readings',
    requireAuth,
    asyncHandler(async (req, res) => {
      const sensorId = parseOrThrow(Uuid, req.params.sensorId);
      const q = parseOrThrow(ReadingsQuery, req.query);
      const rows = await readings.listForSensor(sensorId, { from: q.start_date, to: q.end_date, limit: q.limit });
      res.json({ ok: true, count: rows.length, readings: rows });
    })
  );

  return router;
}
