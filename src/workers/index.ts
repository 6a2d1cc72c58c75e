// Central registry for all housekeeping workers
import type { AirConditionerService } from '../services/acService';
import type { AlertService } from '../services/alertService';
import type { ReadingService } from '../services/readingService';
import type { SensorService } from '../services/sensorService';
import type { WorkerFn } from '../utils/runWorker';
import { runAlertCleanupWorker } from './alertCleanupWorker';
import { runAlertEscalationWorker } from './alertEscalationWorker';
import { runCommandLogRetentionWorker } from './commandLogRetentionWorker';
import { runReadingAggregationWorker } from './readingAggregationWorker';
import { runReadingRetentionWorker } from './readingRetentionWorker';
import { runSensorStatusWorker } from './sensorStatusWorker';

export const WORKER_NAMES = [
  'sensor-status',
  'reading-aggregation',
  'reading-retention',
  'command-log-retention',
  'alert-cleanup',
  'alert-escalation',
] as const;
export type WorkerName = (typeof WORKER_NAMES)[number];

export type WorkerDeps = {
  sensors: SensorService;
  readings: ReadingService;
  airConditioners: AirConditionerService;
  alerts: AlertService;
};

export type WorkerRegistry = Record<WorkerName, WorkerFn>;

export function isWorkerName(value: string): value is WorkerName {
  return WORKER_NAMES.some((n) => n === value);
}

export function buildWorkers(deps: WorkerDeps): WorkerRegistry {
  return {
    'sensor-status': () => runSensorStatusWorker(deps.sensors),
    'reading-aggregation': () => runReadingAggregationWorker(deps.readings),
    'reading-retention': () => runReadingRetentionWorker(deps.readings),
    'command-log-retention': () => runCommandLogRetentionWorker(deps.airConditioners),
    'alert-cleanup': () => runAlertCleanupWorker(deps.alerts),
    'alert-escalation': () => runAlertEscalationWorker(deps.alerts),
  };
}
