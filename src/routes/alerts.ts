// routes/alerts.ts
import express from 'express';
import type { RequestHandler, Router } from 'express';
import { UnauthorizedError } from '../errors';
import type { AlertService } from '../services/alertService';
import { asyncHandler } from '../utils/asyncHandler';
import { AlertsQuery, RoomQuery, RoomScopeBody, Uuid, parseOrThrow } from '../validators';

export type AlertsRouterDeps = {
  alerts: AlertService;
  requireAuth: RequestHandler;
  requireOperator: RequestHandler;
};

export function createAlertsRouter(deps: AlertsRouterDeps): Router {
  const router = express.Router();
  const { alerts, requireAuth, requireOperator } = deps;

  router.use(requireAuth);

  /**
   * GET /api/alerts?room_id&severity
   * Open (unacknowledged) alerts, newest first.
   */
  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const q = parseOrThrow(AlertsQuery, req.query);
      const rows = await alerts.listActive({ roomId: q.room_id, severity: q.severity });
      res.json({ ok: true, count: rows.length, alerts: rows });
    })
  );

  router.get(
    '/summary',
    asyncHandler(async (req, res) => {
      const { room_id } = parseOrThrow(RoomQuery, req.query);
      res.json({ ok: true, counts: await alerts.getActiveAlertsCount(room_id) });
    })
  );

  router.post(
    '/acknowledge-all',
    requireOperator,
    asyncHandler(async (req, res) => {
      const user = req.auth;
      if (!user) throw new UnauthorizedError();
      const { room_id } = parseOrThrow(RoomScopeBody, req.body);
      const acknowledged = await alerts.acknowledgeAll(user.userId, room_id);
      res.json({ ok: true, acknowledged, message: `${acknowledged} alerts acknowledged` });
    })
  );

  router.post(
    '/:alertId/acknowledge',
    requireOperator,
    asyncHandler(async (req, res) => {
      const user = req.auth;
      if (!user) throw new UnauthorizedError();
      const alertId = parseOrThrow(Uuid, req.params.alertId);
      const alert = await alerts.acknowledge(alertId, user.userId);
      res.json({ ok: true, alert, message: 'Alert acknowledged' });
    })
  );

  return router;
}
