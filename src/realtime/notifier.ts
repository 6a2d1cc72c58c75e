import { logger } from '../utils/logger';
import { actorLabel } from '../types';
import type { Actor, AirConditioner, Alert, Reading, Sensor } from '../types';
import { DASHBOARD_TOPIC, roomTopic } from './events';
import type { EventKind, EventMessage, EventPayloads, PubSubTransport } from './events';

const log = logger.child({ module: 'notifier' });

/**
 * Notification fan-out. Every event goes to the dashboard topic and to the
 * room's own topic. Publishing never throws and never waits on delivery.
 */
export class Notifier {
  constructor(private readonly transport: PubSubTransport) {}

  publish<K extends EventKind>(kind: K, roomId: string, payload: EventPayloads[K]): void {
    const message: EventMessage = {
      type: kind,
      data: payload,
      timestamp: new Date().toISOString(),
    };

    this.deliver(DASHBOARD_TOPIC, message);
    this.deliver(roomTopic(roomId), message);
  }

  sensorReading(reading: Reading, sensor: Sensor): void {
    this.publish('sensor_reading', sensor.room_id, {
      room_id: sensor.room_id,
      sensor_id: sensor.id,
      temperature: reading.temperature,
      humidity: reading.humidity,
      timestamp: reading.timestamp.toISOString(),
    });
  }

  acStatusChanged(ac: AirConditioner, actor: Actor): void {
    this.publish('ac_status_changed', ac.room_id, {
      room_id: ac.room_id,
      ac_id: ac.id,
      status: ac.status,
      changed_by: actorLabel(actor),
    });
  }

  alertTriggered(alert: Alert): void {
    this.publish('alert_triggered', alert.room_id, {
      room_id: alert.room_id,
      alert_id: alert.id,
      alert_type: alert.alert_type,
      severity: alert.severity,
      message: alert.message,
    });
  }

  connectionStatus(sensor: Sensor): void {
    this.publish('connection_status', sensor.room_id, {
      sensor_id: sensor.id,
      sensor_name: sensor.name,
      device_id: sensor.device_id,
      is_online: sensor.is_online,
      room_id: sensor.room_id,
    });
  }

  private deliver(topic: string, message: EventMessage): void {
    try {
      const result = this.transport.publish(topic, message);
      if (result instanceof Promise) {
        void result.catch((err: unknown) => {
          log.warn({ topic, type: message.type, err }, 'Failed to publish event');
        });
      }
    } catch (err) {
      log.warn({ topic, type: message.type, err }, 'Failed to publish event');
    }
  }
}
