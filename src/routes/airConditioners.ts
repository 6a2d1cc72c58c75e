// routes/airConditioners.ts
import express from 'express';
import type { RequestHandler, Router } from 'express';
import type { ThermalStore } from '../db/store';
import { AppError, CommandFailedError, NotFoundError } from '../errors';
import { actorFrom } from '../middleware/auth';
import type { AirConditionerService } from '../services/acService';
import type { AirConditioner } from '../types';
import { asyncHandler } from '../utils/asyncHandler';
import { logger } from '../utils/logger';
import { IrSignalBody, RecordIrBody, RoomScopeBody, Uuid, parseOrThrow } from '../validators';

const log = logger.child({ module: 'routes/air-conditioners' });

const COMMAND_LOG_LIMIT = 50;

export type AirConditionersRouterDeps = {
  store: ThermalStore;
  airConditioners: AirConditionerService;
  requireDevice: RequestHandler;
  requireAuth: RequestHandler;
  requireOperator: RequestHandler;
};

export function createAirConditionersRouter(deps: AirConditionersRouterDeps): Router {
  const router = express.Router();
  const { store, airConditioners, requireDevice, requireAuth, requireOperator } = deps;

  async function loadAc(rawId: string): Promise<AirConditioner> {
    const id = parseOrThrow(Uuid, rawId);
    const ac = await store.airConditioners.findById(id);
    if (!ac) throw new NotFoundError(`Air conditioner ${id} not found`, 'air_conditioner_not_found');
    return ac;
  }

  // Status after a command, falling back to what we had if the row vanished.
  async function reload(ac: AirConditioner): Promise<AirConditioner> {
    return (await store.airConditioners.findById(ac.id)) ?? ac;
  }

  /**
   * POST /api/air-conditioners/:acId/ir-signal
   * The transmitter reports a learned IR frame.
   */
  router.post(
    '/:acId/ir-signal',
    requireDevice,
    asyncHandler(async (req, res) => {
      const ac = await loadAc(req.params.acId);
      const body = parseOrThrow(IrSignalBody, req.body);
      if (!body.success) {
        log.warn({ acId: ac.id, commandType: body.command_type, message: body.message }, 'Transmitter reported recording failure');
        throw new AppError(body.message ?? 'IR recording failed', 400, 'recording_failed');
      }

      const signal = await airConditioners.recordIrSignal(ac, body.command_type, body.raw_signal, body.protocol);
      res.json({ ok: true, signal, message: 'IR signal recorded' });
    })
  );

  router.use(requireAuth);

  /**
   * POST /api/air-conditioners/turn-off-all
   * Emergency stop for every running unit, optionally limited to one room.
   */
  router.post(
    '/turn-off-all',
    requireOperator,
    asyncHandler(async (req, res) => {
      const { room_id } = parseOrThrow(RoomScopeBody, req.body);
      const actor = actorFrom(req);
      const results = await airConditioners.turnOffAll(actor, room_id);

      log.warn({ roomId: room_id, by: req.auth?.userId, count: results.length }, 'Turn off all executed');
      res.json({ ok: true, results, message: `${results.length} air conditioners turned off` });
    })
  );

  router.get(
    '/:acId',
    asyncHandler(async (req, res) => {
      res.json({ ok: true, data: await loadAc(req.params.acId) });
    })
  );

  router.post(
    '/:acId/turn-on',
    requireOperator,
    asyncHandler(async (req, res) => {
      const ac = await loadAc(req.params.acId);
      if (!(await airConditioners.turnOn(ac, actorFrom(req)))) {
        throw new CommandFailedError(`Failed to turn on ${ac.name}`);
      }
      res.json({ ok: true, data: await reload(ac), message: `${ac.name} turned on` });
    })
  );

  router.post(
    '/:acId/turn-off',
    requireOperator,
    asyncHandler(async (req, res) => {
      const ac = await loadAc(req.params.acId);
      if (!(await airConditioners.turnOff(ac, actorFrom(req)))) {
        throw new CommandFailedError(`Failed to turn off ${ac.name}`);
      }
      res.json({ ok: true, data: await reload(ac), message: `${ac.name} turned off` });
    })
  );

  router.post(
    '/:acId/toggle',
    requireOperator,
    asyncHandler(async (req, res) => {
      const ac = await loadAc(req.params.acId);
      const { success, target } = await airConditioners.toggle(ac, actorFrom(req));
      if (!success) throw new CommandFailedError(`Failed to toggle ${ac.name}`);
      res.json({ ok: true, data: await reload(ac), message: `${ac.name} turned ${target}` });
    })
  );

  router.get(
    '/:acId/logs',
    asyncHandler(async (req, res) => {
      const ac = await loadAc(req.params.acId);
      const logs = await store.commandLogs.listForAc(ac.id, COMMAND_LOG_LIMIT);
      res.json({ ok: true, count: logs.length, logs });
    })
  );

  router.get(
    '/:acId/ir-signals',
    asyncHandler(async (req, res) => {
      const ac = await loadAc(req.params.acId);
      const signals = await store.irSignals.listForAc(ac.id);
      res.json({ ok: true, count: signals.length, signals });
    })
  );

  /**
   * POST /api/air-conditioners/:acId/record-ir
   * Puts the transmitter into learning mode; the frame arrives later on
   * /ir-signal.
   */
  router.post(
    '/:acId/record-ir',
    requireOperator,
    asyncHandler(async (req, res) => {
      const ac = await loadAc(req.params.acId);
      const { command_type } = parseOrThrow(RecordIrBody, req.body);
      await airConditioners.startIrRecording(ac, command_type);
      res.json({
        ok: true,
        data: { command_type },
        message: 'Recording mode started. Point the remote at the transmitter and press the button.',
      });
    })
  );

  return router;
}
