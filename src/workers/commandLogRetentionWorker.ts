import type { AirConditionerService } from '../services/acService';
import type { WorkerSummary } from '../utils/runWorker';

export async function runCommandLogRetentionWorker(airConditioners: AirConditionerService): Promise<WorkerSummary> {
  return { deleted_count: await airConditioners.cleanupOldCommandLogs() };
}
