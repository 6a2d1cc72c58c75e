import type { AcStatus, AlertType, Severity } from '../types';

export const DASHBOARD_TOPIC = 'dashboard';

export function roomTopic(roomId: string): string {
  return `room:${roomId}`;
}

export type SensorReadingPayload = {
  room_id: string;
  sensor_id: string;
  temperature: number | null;
  humidity: number | null;
  timestamp: string;
};

export type AcStatusPayload = {
  room_id: string;
  ac_id: string;
  status: AcStatus;
  changed_by: string;
};

export type AlertPayload = {
  room_id: string;
  alert_id: string;
  alert_type: AlertType;
  severity: Severity;
  message: string;
};

export type ConnectionStatusPayload = {
  sensor_id: string;
  sensor_name: string;
  device_id: string;
  is_online: boolean;
  room_id: string;
};

export type EventPayloads = {
  sensor_reading: SensorReadingPayload;
  ac_status_changed: AcStatusPayload;
  alert_triggered: AlertPayload;
  connection_status: ConnectionStatusPayload;
};

export type EventKind = keyof EventPayloads;

export type EventMessage<K extends EventKind = EventKind> = {
  type: K;
  data: EventPayloads[K];
  timestamp: string;
};

/**
 * Topic-addressed delivery. Returns how many subscribers received the
 * message; a remote transport may resolve asynchronously.
 */
export interface PubSubTransport {
  publish(topic: string, message: EventMessage): number | Promise<number>;
}
