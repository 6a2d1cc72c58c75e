import dayjs from 'dayjs';
import type { ThermalSettings } from '../config';
import type { AlertFilter, ThermalStore } from '../db/store';
import { AlreadyAcknowledgedError, NotFoundError, errorMessage } from '../errors';
import type { Notifier } from '../realtime/notifier';
import type { Alert, AlertCounts, AlertType, Reading, Room, Severity } from '../types';
import { KeyedMutex } from '../utils/keyedMutex';
import { logger } from '../utils/logger';
import { evaluateHumidity, evaluateTemperature } from './thresholds';
import type { ThresholdBreach } from './thresholds';

const log = logger.child({ module: 'alerts' });

/** Where escalated alerts are pushed beyond the log. */
export interface EscalationSink {
  notify(alert: Alert): Promise<void>;
}

export type AlertServiceDeps = {
  store: ThermalStore;
  notifier: Notifier;
  settings: ThermalSettings;
  escalation?: EscalationSink;
  now?: () => Date;
};

export type EscalationSummary = {
  escalated: number;
  notified: number;
  failed: number;
  alert_ids: string[];
};

export class AlertService {
  private readonly store: ThermalStore;
  private readonly notifier: Notifier;
  private readonly settings: ThermalSettings;
  private readonly escalation?: EscalationSink;
  private readonly now: () => Date;
  // Dedup check and insert for one (room, type) pair never interleave.
  private readonly creating = new KeyedMutex();

  constructor(deps: AlertServiceDeps) {
    this.store = deps.store;
    this.notifier = deps.notifier;
    this.settings = deps.settings;
    this.escalation = deps.escalation;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Raises an alert unless an unacknowledged one of the same type exists for
   * the room within the cooldown window. Returns null when suppressed.
   */
  async createAlert(roomId: string, alertType: AlertType, severity: Severity, message: string): Promise<Alert | null> {
    return this.creating.run(`${roomId}:${alertType}`, async () => {
      const since = dayjs(this.now()).subtract(this.settings.alertCooldownMinutes, 'minute').toDate();
      const recent = await this.store.alerts.findRecentUnacknowledged(roomId, alertType, since);
      if (recent) {
        log.debug({ roomId, alertType, existing: recent.id }, 'Alert suppressed by cooldown');
        return null;
      }

      const alert = await this.store.alerts.create({ room_id: roomId, alert_type: alertType, severity, message });
      const level = severity === 'critical' ? 'error' : severity === 'warning' ? 'warn' : 'info';
      log[level]({ alertId: alert.id, roomId, alertType, severity }, `🚨 ${message}`);
      this.notifier.alertTriggered(alert);
      return alert;
    });
  }

  /** Applies the threshold rules to one reading against its room's setpoints. */
  async evaluateReading(reading: Reading, room: Room): Promise<Alert[]> {
    const breaches: ThresholdBreach[] = [];
    if (reading.temperature !== null) {
      const t = evaluateTemperature(reading.temperature, room.target_temperature, this.settings);
      if (t) breaches.push(t);
    }
    if (reading.humidity !== null) {
      const h = evaluateHumidity(reading.humidity, room.target_humidity, this.settings);
      if (h) breaches.push(h);
    }

    const created: Alert[] = [];
    for (const b of breaches) {
      const alert = await this.createAlert(room.id, b.alertType, b.severity, b.message);
      if (alert) created.push(alert);
    }
    return created;
  }

  async acknowledge(alertId: string, userId: string): Promise<Alert> {
    const acked = await this.store.alerts.acknowledge(alertId, userId, this.now());
    if (acked) {
      log.info({ alertId, userId }, 'Alert acknowledged');
      return acked;
    }

    // The CAS lost: either the alert does not exist or it was already acknowledged.
    const existing = await this.store.alerts.findById(alertId);
    if (!existing) throw new NotFoundError(`Alert ${alertId} not found`, 'alert_not_found');
    throw new AlreadyAcknowledgedError(alertId);
  }

  async acknowledgeAll(userId: string, roomId?: string): Promise<number> {
    const count = await this.store.alerts.acknowledgeAll(userId, this.now(), roomId);
    log.info({ userId, roomId, count }, 'Alerts acknowledged in bulk');
    return count;
  }

  getActiveAlertsCount(roomId?: string): Promise<AlertCounts> {
    return this.store.alerts.countUnacknowledged(roomId);
  }

  listActive(filter: AlertFilter = {}): Promise<Alert[]> {
    return this.store.alerts.listUnacknowledged(filter);
  }

  /**
   * Critical alerts left unacknowledged past the escalation window. Each one
   * is logged and, when a sink is configured, pushed to it; a failed push
   * does not stop the others.
   */
  async escalateCriticalAlerts(): Promise<EscalationSummary> {
    const cutoff = dayjs(this.now()).subtract(this.settings.alertEscalationMinutes, 'minute').toDate();
    const stale = await this.store.alerts.findUnacknowledgedCriticalBefore(cutoff);

    let notified = 0;
    let failed = 0;
    for (const alert of stale) {
      log.warn(
        { alertId: alert.id, roomId: alert.room_id, createdAt: alert.created_at.toISOString() },
        `ESCALATION: ${alert.message}`
      );
      if (!this.escalation) continue;
      try {
        await this.escalation.notify(alert);
        notified++;
      } catch (err) {
        failed++;
        log.error({ alertId: alert.id, err: errorMessage(err) }, 'Escalation delivery failed');
      }
    }

    return { escalated: stale.length, notified, failed, alert_ids: stale.map((a) => a.id) };
  }

  /** Deletes acknowledged alerts older than the retention window. */
  async cleanupOldAlerts(): Promise<number> {
    const cutoff = dayjs(this.now()).subtract(this.settings.alertRetentionDays, 'day').toDate();
    const deleted = await this.store.alerts.deleteAcknowledgedBefore(cutoff);
    log.info({ deleted, cutoff: cutoff.toISOString() }, 'Old alerts cleaned up');
    return deleted;
  }
}
