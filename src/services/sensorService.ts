import dayjs from 'dayjs';
import type { ThermalSettings } from '../config';
import type { MarkOnlineResult, NewSensor, ThermalStore } from '../db/store';
import { NotFoundError, errorMessage } from '../errors';
import type { Notifier } from '../realtime/notifier';
import type { RoomAverages, Sensor } from '../types';
import { logger } from '../utils/logger';
import type { AlertService } from './alertService';

const log = logger.child({ module: 'sensors' });

export type SensorIdentifier = {
  sensor_id?: string;
  device_id?: string;
};

export type SensorSweepSummary = {
  checked: number;
  marked_offline: number;
  alerts_created: number;
  failed: number;
};

export type SensorServiceDeps = {
  store: ThermalStore;
  alerts: AlertService;
  notifier: Notifier;
  settings: ThermalSettings;
  now?: () => Date;
};

/** ESP32 MACs arrive as `aa-bb-cc-...` or `AA:BB:CC:...`; stored as the latter. */
export function normalizeDeviceId(deviceId: string): string {
  return deviceId.trim().toUpperCase().replace(/-/g, ':');
}

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Device registry: sensor identity and online/offline liveness. */
export class SensorService {
  private readonly store: ThermalStore;
  private readonly alerts: AlertService;
  private readonly notifier: Notifier;
  private readonly settings: ThermalSettings;
  private readonly now: () => Date;

  constructor(deps: SensorServiceDeps) {
    this.store = deps.store;
    this.alerts = deps.alerts;
    this.notifier = deps.notifier;
    this.settings = deps.settings;
    this.now = deps.now ?? (() => new Date());
  }

  async registerSensor(input: NewSensor): Promise<Sensor> {
    if (!(await this.store.rooms.exists(input.room_id))) {
      throw new NotFoundError(`Room ${input.room_id} not found`, 'room_not_found');
    }
    const sensor = await this.store.sensors.create({
      room_id: input.room_id,
      device_id: normalizeDeviceId(input.device_id),
      name: input.name,
    });
    log.info({ sensorId: sensor.id, deviceId: sensor.device_id, roomId: sensor.room_id }, 'Sensor registered');
    return sensor;
  }

  /** Looks a sensor up by internal id first, then by device id. */
  async resolveSensor(identifier: SensorIdentifier): Promise<Sensor> {
    let sensor: Sensor | null = null;
    if (identifier.sensor_id) {
      sensor = await this.store.sensors.findById(identifier.sensor_id);
    } else if (identifier.device_id) {
      sensor = await this.store.sensors.findByDeviceId(normalizeDeviceId(identifier.device_id));
    }

    if (!sensor) {
      const key = identifier.sensor_id ?? identifier.device_id ?? '(none)';
      throw new NotFoundError(`Sensor ${key} not found`, 'sensor_not_found');
    }
    return sensor;
  }

  /**
   * Sets is_online and last_seen. An offline to online transition is
   * published as a connection_status event.
   */
  async markOnline(sensor: Sensor): Promise<MarkOnlineResult> {
    const result = await this.store.sensors.markOnline(sensor.id, this.now());
    if (!result) throw new NotFoundError(`Sensor ${sensor.id} not found`, 'sensor_not_found');

    if (!result.wasOnline) {
      log.info({ sensorId: sensor.id, deviceId: sensor.device_id }, 'Sensor back online');
      this.notifier.connectionStatus(result.sensor);
    }
    return result;
  }

  /**
   * Liveness sweep. Each stale sensor is flipped with a compare-and-set, so
   * a reading that lands mid-sweep wins and a second sweep does nothing.
   */
  async checkAllSensorStatus(): Promise<SensorSweepSummary> {
    const cutoff = dayjs(this.now()).subtract(this.settings.sensorOfflineThresholdMinutes, 'minute').toDate();
    const stale = await this.store.sensors.findStaleOnline(cutoff);
    const summary: SensorSweepSummary = { checked: stale.length, marked_offline: 0, alerts_created: 0, failed: 0 };

    for (const candidate of stale) {
      try {
        const sensor = await this.store.sensors.markOffline(candidate.id, cutoff);
        if (!sensor) continue;

        summary.marked_offline++;
        log.warn({ sensorId: sensor.id, deviceId: sensor.device_id, lastSeen: sensor.last_seen }, 'Sensor offline');
        this.notifier.connectionStatus(sensor);

        const alert = await this.alerts.createAlert(
          sensor.room_id,
          'sensor_offline',
          'warning',
          `Sensor offline: ${sensor.name} (${sensor.device_id})`
        );
        if (alert) summary.alerts_created++;
      } catch (err) {
        summary.failed++;
        log.error({ sensorId: candidate.id, err: errorMessage(err) }, 'Failed to update sensor status');
      }
    }

    return summary;
  }

  /** Mean of the latest reading of each online sensor in the room. */
  async getRoomAverageReadings(roomId: string): Promise<RoomAverages> {
    if (!(await this.store.rooms.exists(roomId))) {
      throw new NotFoundError(`Room ${roomId} not found`, 'room_not_found');
    }
    const latest = (await this.store.readings.latestPerSensor(roomId)).filter((r) => r.is_online);

    const temps: number[] = [];
    const hums: number[] = [];
    for (const r of latest) {
      if (r.temperature !== null) temps.push(r.temperature);
      if (r.humidity !== null) hums.push(r.humidity);
    }
    return { temperature: mean(temps), humidity: mean(hums) };
  }
}
