import type { AlertService } from '../services/alertService';
import type { WorkerSummary } from '../utils/runWorker';

/**
 * Re-reports every critical alert still open past the escalation window.
 * Alerts are not modified, so the same alert is reported on each run until
 * someone acknowledges it.
 */
export async function runAlertEscalationWorker(alerts: AlertService): Promise<WorkerSummary> {
  const summary = await alerts.escalateCriticalAlerts();
  return { ...summary, success: summary.failed === 0 };
}
