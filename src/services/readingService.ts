import dayjs from 'dayjs';
import type { ThermalSettings } from '../config';
import type { ReadingRange, ThermalStore } from '../db/store';
import { NotFoundError, errorMessage } from '../errors';
import type { LatestSensorReading, Reading } from '../types';
import { logger } from '../utils/logger';

const log = logger.child({ module: 'readings' });

export type AggregationSummary = {
  sensors_processed: number;
  buckets_written: number;
  failed: number;
};

export type ReadingServiceDeps = {
  store: ThermalStore;
  settings: ThermalSettings;
  now?: () => Date;
};

/** Read side of the time series plus its retention housekeeping. */
export class ReadingService {
  private readonly store: ThermalStore;
  private readonly settings: ThermalSettings;
  private readonly now: () => Date;

  constructor(deps: ReadingServiceDeps) {
    this.store = deps.store;
    this.settings = deps.settings;
    this.now = deps.now ?? (() => new Date());
  }

  async latestForSensor(sensorId: string): Promise<Reading> {
    await this.requireSensor(sensorId);
    const reading = await this.store.readings.latestForSensor(sensorId);
    if (!reading) throw new NotFoundError(`No readings for sensor ${sensorId}`, 'no_readings');
    return reading;
  }

  async listForSensor(sensorId: string, range: ReadingRange): Promise<Reading[]> {
    await this.requireSensor(sensorId);
    return this.store.readings.listForSensor(sensorId, range);
  }

  latestPerSensor(roomId?: string): Promise<LatestSensorReading[]> {
    return this.store.readings.latestPerSensor(roomId);
  }

  async cleanupOldReadings(): Promise<number> {
    const cutoff = dayjs(this.now()).subtract(this.settings.dataRetentionDays, 'day').toDate();
    const deleted = await this.store.readings.deleteOlderThan(cutoff);
    log.info({ deleted, cutoff: cutoff.toISOString() }, 'Old readings cleaned up');
    return deleted;
  }

  /**
   * Compacts raw readings older than the aggregation window into hourly
   * buckets, one sensor at a time. A failing sensor is counted and skipped.
   */
  async aggregateReadings(): Promise<AggregationSummary> {
    const cutoff = dayjs(this.now()).subtract(this.settings.readingAggregationHours, 'hour').toDate();
    const sensorIds = await this.store.readings.sensorIdsWithReadingsBefore(cutoff);
    const summary: AggregationSummary = { sensors_processed: 0, buckets_written: 0, failed: 0 };

    for (const sensorId of sensorIds) {
      try {
        summary.buckets_written += await this.store.readings.compactHourly(sensorId, cutoff);
        summary.sensors_processed++;
      } catch (err) {
        summary.failed++;
        log.error({ sensorId, err: errorMessage(err) }, 'Failed to aggregate readings');
      }
    }

    log.info({ ...summary, cutoff: cutoff.toISOString() }, 'Readings aggregated');
    return summary;
  }

  private async requireSensor(sensorId: string): Promise<void> {
    if (!(await this.store.sensors.findById(sensorId))) {
      throw new NotFoundError(`Sensor ${sensorId} not found`, 'sensor_not_found');
    }
  }
}
