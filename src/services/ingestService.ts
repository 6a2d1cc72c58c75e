import type { ThermalStore } from '../db/store';
import { AppError, ValidationError, errorMessage } from '../errors';
import type { Notifier } from '../realtime/notifier';
import type { Reading, Room, Sensor } from '../types';
import { logger } from '../utils/logger';
import { ReadingItem, parseOrThrow } from '../validators';
import type { AirConditionerService } from './acService';
import type { AlertService } from './alertService';
import type { SensorIdentifier, SensorService } from './sensorService';

const log = logger.child({ module: 'ingest' });

export const TEMPERATURE_RANGE = { min: -40, max: 80 } as const;
export const HUMIDITY_RANGE = { min: 0, max: 100 } as const;

export type ReadingSubmission = SensorIdentifier & {
  temperature?: number | null;
  humidity?: number | null;
  timestamp?: Date;
};

export type BulkItemOutcome =
  | { index: number; ok: true; reading: Reading }
  | { index: number; ok: false; error: string; code: string };

export type BulkResult = {
  created: number;
  failed: number;
  results: BulkItemOutcome[];
};

export type IngestServiceDeps = {
  store: ThermalStore;
  sensors: SensorService;
  alerts: AlertService;
  airConditioners: AirConditionerService;
  notifier: Notifier;
  now?: () => Date;
};

function checkRange(field: string, value: number, range: { min: number; max: number }): string | null {
  if (!Number.isFinite(value) || value < range.min || value > range.max) {
    return `${field} must be between ${range.min} and ${range.max}`;
  }
  return null;
}

export function validateSubmission(input: ReadingSubmission): void {
  const problems: string[] = [];
  const temperature = input.temperature ?? null;
  const humidity = input.humidity ?? null;

  if (!input.sensor_id && !input.device_id) problems.push('device_id or sensor_id is required');
  if (temperature === null && humidity === null) problems.push('temperature or humidity is required');
  if (temperature !== null) {
    const p = checkRange('temperature', temperature, TEMPERATURE_RANGE);
    if (p) problems.push(p);
  }
  if (humidity !== null) {
    const p = checkRange('humidity', humidity, HUMIDITY_RANGE);
    if (p) problems.push(p);
  }

  if (problems.length > 0) throw new ValidationError(problems.join('; '), problems);
}

/**
 * Hot path for sensor readings. Validation and lookup errors reach the
 * caller; once the reading is stored, alerting, automatic control and
 * broadcast each run on their own and only log their failures.
 */
export class IngestService {
  private readonly store: ThermalStore;
  private readonly sensors: SensorService;
  private readonly alerts: AlertService;
  private readonly airConditioners: AirConditionerService;
  private readonly notifier: Notifier;
  private readonly now: () => Date;

  constructor(deps: IngestServiceDeps) {
    this.store = deps.store;
    this.sensors = deps.sensors;
    this.alerts = deps.alerts;
    this.airConditioners = deps.airConditioners;
    this.notifier = deps.notifier;
    this.now = deps.now ?? (() => new Date());
  }

  async submitReading(input: ReadingSubmission): Promise<Reading> {
    validateSubmission(input);
    const sensor = await this.sensors.resolveSensor(input);
    await this.sensors.markOnline(sensor);

    const reading = await this.store.readings.create({
      sensor_id: sensor.id,
      temperature: input.temperature ?? null,
      humidity: input.humidity ?? null,
      timestamp: input.timestamp ?? this.now(),
    });

    await this.afterIngest(reading, sensor);
    return reading;
  }

  /**
   * Items are parsed and processed in order; one failing item does not stop
   * the rest.
   */
  async submitReadingsBulk(items: unknown[]): Promise<BulkResult> {
    const results: BulkItemOutcome[] = [];
    for (const [index, item] of items.entries()) {
      try {
        const input = parseOrThrow(ReadingItem, item);
        results.push({ index, ok: true, reading: await this.submitReading(input) });
      } catch (err) {
        if (err instanceof AppError) {
          results.push({ index, ok: false, error: err.message, code: err.code });
        } else {
          log.error({ index, err: errorMessage(err) }, 'Bulk reading failed');
          results.push({ index, ok: false, error: 'Internal error', code: 'server_error' });
        }
      }
    }

    const created = results.filter((r) => r.ok).length;
    return { created, failed: results.length - created, results };
  }

  private async afterIngest(reading: Reading, sensor: Sensor): Promise<void> {
    let room: Room | null = null;
    try {
      room = await this.store.rooms.findById(sensor.room_id);
    } catch (err) {
      log.error({ sensorId: sensor.id, roomId: sensor.room_id, err: errorMessage(err) }, 'Room lookup failed');
    }

    if (room) {
      const target = room;
      try {
        await this.alerts.evaluateReading(reading, target);
      } catch (err) {
        log.error({ readingId: reading.id, roomId: target.id, err: errorMessage(err) }, 'Alert evaluation failed');
      }

      const temperature = reading.temperature;
      if (target.operation_mode === 'automatic' && temperature !== null) {
        try {
          await this.airConditioners.applyHysteresis(target, temperature);
        } catch (err) {
          log.error({ readingId: reading.id, roomId: target.id, err: errorMessage(err) }, 'Automatic control failed');
        }
      }
    }

    this.notifier.sensorReading(reading, sensor);
  }
}
