import type { SensorService } from '../services/sensorService';
import type { WorkerSummary } from '../utils/runWorker';

/**
 * Marks sensors offline once they have been silent past the offline
 * threshold. One warning alert and one connection_status event per flip.
 */
export async function runSensorStatusWorker(sensors: SensorService): Promise<WorkerSummary> {
  const summary = await sensors.checkAllSensorStatus();
  return { ...summary, success: summary.failed === 0 };
}
