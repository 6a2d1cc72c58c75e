import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { EscalationSink } from '../services/alertService';
import type { Alert } from '../types';

/** Posts escalated alerts as JSON to an operator-configured URL. */
export class WebhookEscalationSink implements EscalationSink {
  private readonly client: AxiosInstance;

  constructor(
    private readonly url: string,
    opts: { timeoutMs?: number; client?: AxiosInstance } = {}
  ) {
    this.client = opts.client ?? axios.create({ timeout: opts.timeoutMs ?? 5000 });
  }

  async notify(alert: Alert): Promise<void> {
    await this.client.post(this.url, {
      event: 'alert_escalated',
      alert_id: alert.id,
      room_id: alert.room_id,
      alert_type: alert.alert_type,
      severity: alert.severity,
      message: alert.message,
      created_at: alert.created_at.toISOString(),
    });
  }
}
