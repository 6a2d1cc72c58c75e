import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { logger } from '../utils/logger';
import type { CommandType } from '../types';

const log = logger.child({ module: 'ir' });

export type TransmitResult = {
  ok: boolean;
  response: string;
};

/**
 * ESP32 IR transmitter boundary. Implementations never throw: timeouts and
 * transport errors come back as `ok: false`.
 */
export interface IrTransmitter {
  send(deviceId: string, signal: string, commandType: CommandType): Promise<TransmitResult>;
  enterRecordingMode(deviceId: string, commandType: CommandType): Promise<TransmitResult>;
}

export type HttpIrTransmitterOptions = {
  baseUrl: string;
  timeoutMs: number;
  client?: AxiosInstance;
};

function describeError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') return 'Timed out waiting for transmitter';
    if (err.response) return `Transmitter responded ${err.response.status}`;
    return err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Talks to transmitters through an HTTP gateway:
 *   POST {baseUrl}/devices/{deviceId}/ir/send    { command_type, signal }
 *   POST {baseUrl}/devices/{deviceId}/ir/record  { command_type }
 */
export class HttpIrTransmitter implements IrTransmitter {
  private readonly http: AxiosInstance;

  constructor(private readonly opts: HttpIrTransmitterOptions) {
    this.http = opts.client ?? axios.create({ baseURL: opts.baseUrl });
  }

  async send(deviceId: string, signal: string, commandType: CommandType): Promise<TransmitResult> {
    return this.post(deviceId, 'send', { command_type: commandType, signal });
  }

  async enterRecordingMode(deviceId: string, commandType: CommandType): Promise<TransmitResult> {
    return this.post(deviceId, 'record', { command_type: commandType });
  }

  private async post(
    deviceId: string,
    action: 'send' | 'record',
    body: Record<string, string>
  ): Promise<TransmitResult> {
    if (!this.opts.baseUrl && !this.opts.client) {
      return { ok: false, response: 'IR_GATEWAY_URL not configured' };
    }

    const url = `/devices/${encodeURIComponent(deviceId)}/ir/${action}`;
    try {
      const res = await this.http.post(url, body, { timeout: this.opts.timeoutMs });
      log.debug({ deviceId, action, status: res.status }, 'IR request accepted');
      return { ok: true, response: 'OK' };
    } catch (err) {
      const response = describeError(err);
      log.warn({ deviceId, action, response }, 'IR request failed');
      return { ok: false, response };
    }
  }
}
