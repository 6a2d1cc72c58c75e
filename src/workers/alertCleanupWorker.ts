import type { AlertService } from '../services/alertService';
import type { WorkerSummary } from '../utils/runWorker';

/** Deletes acknowledged alerts past retention. Open alerts are never touched. */
export async function runAlertCleanupWorker(alerts: AlertService): Promise<WorkerSummary> {
  return { deleted_count: await alerts.cleanupOldAlerts() };
}
