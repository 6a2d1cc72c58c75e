// routes/rooms.ts
import express from 'express';
import type { RequestHandler, Router } from 'express';
import type { ThermalStore } from '../db/store';
import { NotFoundError } from '../errors';
import type { SensorService } from '../services/sensorService';
import type { Room } from '../types';
import { asyncHandler } from '../utils/asyncHandler';
import { logger } from '../utils/logger';
import { RoomSettingsBody, Uuid, parseOrThrow } from '../validators';

const log = logger.child({ module: 'routes/rooms' });

export type RoomsRouterDeps = {
  store: ThermalStore;
  sensors: SensorService;
  requireAuth: RequestHandler;
  requireOperator: RequestHandler;
};

function settingsOf(room: Room) {
  return {
    room_id: room.id,
    name: room.name,
    target_temperature: room.target_temperature,
    target_humidity: room.target_humidity,
    operation_mode: room.operation_mode,
  };
}

export function createRoomsRouter(deps: RoomsRouterDeps): Router {
  const router = express.Router();
  const { store, sensors, requireAuth, requireOperator } = deps;

  router.use(requireAuth);

  router.get(
    '/:roomId/settings',
    asyncHandler(async (req, res) => {
      const roomId = parseOrThrow(Uuid, req.params.roomId);
      const room = await store.rooms.findById(roomId);
      if (!room) throw new NotFoundError(`Room ${roomId} not found`, 'room_not_found');
      res.json({ ok: true, settings: settingsOf(room) });
    })
  );

  /**
   * PATCH /api/rooms/:roomId/settings
   * Setpoints and operation mode. Only the fields sent are written.
   */
  router.patch(
    '/:roomId/settings',
    requireOperator,
    asyncHandler(async (req, res) => {
      const roomId = parseOrThrow(Uuid, req.params.roomId);
      const patch = parseOrThrow(RoomSettingsBody, req.body);
      const room = await store.rooms.updateSettings(roomId, patch);
      if (!room) throw new NotFoundError(`Room ${roomId} not found`, 'room_not_found');

      log.info({ roomId, ...patch, by: req.auth?.userId }, 'Room settings updated');
      res.json({ ok: true, settings: settingsOf(room), message: 'Settings updated' });
    })
  );

  router.get(
    '/:roomId/averages',
    asyncHandler(async (req, res) => {
      const roomId = parseOrThrow(Uuid, req.params.roomId);
      const averages = await sensors.getRoomAverageReadings(roomId);
      res.json({ ok: true, room_id: roomId, ...averages });
    })
  );

  return router;
}
