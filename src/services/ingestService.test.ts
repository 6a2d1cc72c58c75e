import { beforeEach, describe, expect, it } from 'vitest';
import { buildCore } from '../../test/fakes';
import type { Core } from '../../test/fakes';
import { NotFoundError, ValidationError } from '../errors';
import type { Room, Sensor } from '../types';

describe('IngestService', () => {
  let core: Core;
  let room: Room;
  let sensor: Sensor;

  beforeEach(() => {
    core = buildCore({ settings: { hysteresis: 1 } });
    room = core.store.addRoom({ target_temperature: 22, target_humidity: 50, operation_mode: 'automatic' });
    sensor = core.store.addSensor(room.id, { device_id: 'AA:BB:CC:DD:EE:01' });
  });

  describe('validation', () => {
    it('should reject a reading with neither temperature nor humidity and store nothing', async () => {
      await expect(
        core.ingest.submitReading({ device_id: sensor.device_id, temperature: null, humidity: null })
      ).rejects.toBeInstanceOf(ValidationError);

      expect(core.store.readingRows).toHaveLength(0);
      expect(core.store.sensorRows.get(sensor.id)?.is_online).toBe(false);
    });

    it.each([
      [{ temperature: -40.1 }, 'temperature must be between -40 and 80'],
      [{ temperature: 80.5 }, 'temperature must be between -40 and 80'],
      [{ humidity: 100.1 }, 'humidity must be between 0 and 100'],
      [{ humidity: -1 }, 'humidity must be between 0 and 100'],
    ])('should reject out-of-range values %o', async (values, message) => {
      await expect(core.ingest.submitReading({ device_id: sensor.device_id, ...values })).rejects.toThrow(message);
      expect(core.store.readingRows).toHaveLength(0);
    });

    it('should accept the range limits', async () => {
      await core.ingest.submitReading({ device_id: sensor.device_id, temperature: -40, humidity: 100 });
      expect(core.store.readingRows).toHaveLength(1);
    });
  });

  describe('submitReading', () => {
    it('should reject an unknown device with no side effects', async () => {
      await expect(core.ingest.submitReading({ device_id: 'FF:FF:FF:FF:FF:FF', temperature: 30 })).rejects.toBeInstanceOf(
        NotFoundError
      );

      expect(core.store.readingRows).toHaveLength(0);
      expect(core.store.alertRows.size).toBe(0);
      expect(core.transport.published).toHaveLength(0);
    });

    it('should mark the sensor online and store the reading with the device timestamp', async () => {
      const at = new Date('2026-03-02T11:59:30.000Z');

      const reading = await core.ingest.submitReading({ sensor_id: sensor.id, temperature: 22.4, humidity: 48, timestamp: at });

      expect(reading).toMatchObject({ sensor_id: sensor.id, temperature: 22.4, humidity: 48, timestamp: at });
      expect(core.store.sensorRows.get(sensor.id)).toMatchObject({ is_online: true, last_seen: core.clock.now() });
    });

    it('should turn an idle AC on inside the warning band without alerting', async () => {
      const ac = core.store.addAirConditioner(room.id);

      await core.ingest.submitReading({ device_id: sensor.device_id, temperature: 23.5 });

      expect(core.store.acRows.get(ac.id)?.status).toBe('on');
      expect(core.store.commandLogRows).toHaveLength(1);
      expect(core.store.commandLogRows[0]).toMatchObject({ success: true, automatic: true });
      expect(core.store.alertRows.size).toBe(0);
    });

    it('should raise a critical alert naming the reading and the limit', async () => {
      await core.ingest.submitReading({ device_id: sensor.device_id, temperature: 28.0 });

      const alerts = [...core.store.alertRows.values()];
      expect(alerts).toHaveLength(1);
      expect(alerts[0]).toMatchObject({ alert_type: 'high_temp', severity: 'critical' });
      expect(alerts[0].message).toContain('28.0');
      expect(alerts[0].message).toContain('27.0');
    });

    it('should create only one alert for a repeated breach within the cooldown', async () => {
      await core.ingest.submitReading({ device_id: sensor.device_id, temperature: 25 });
      core.clock.advanceMinutes(2);
      await core.ingest.submitReading({ device_id: sensor.device_id, temperature: 25.5 });

      expect(core.store.readingRows).toHaveLength(2);
      expect(core.store.alertRows.size).toBe(1);
    });

    it('should leave ACs alone when the room is in manual mode', async () => {
      await core.store.rooms.updateSettings(room.id, { operation_mode: 'manual' });
      core.store.addAirConditioner(room.id);

      await core.ingest.submitReading({ device_id: sensor.device_id, temperature: 25 });

      expect(core.store.commandLogRows).toHaveLength(0);
    });

    it('should skip automatic control for humidity-only readings', async () => {
      core.store.addAirConditioner(room.id);

      await core.ingest.submitReading({ device_id: sensor.device_id, humidity: 55 });

      expect(core.store.commandLogRows).toHaveLength(0);
    });

    it('should publish the online transition and the reading on both topics', async () => {
      await core.ingest.submitReading({ device_id: sensor.device_id, temperature: 22 });

      expect(core.transport.published.map((p) => [p.message.type, p.topic])).toEqual([
        ['connection_status', 'dashboard'],
        ['connection_status', `room:${room.id}`],
        ['sensor_reading', 'dashboard'],
        ['sensor_reading', `room:${room.id}`],
      ]);
    });

    it('should keep the reading and still broadcast when alerting and actuation fail', async () => {
      core.store.alerts.findRecentUnacknowledged = async () => {
        throw new Error('alerts table locked');
      };
      core.store.airConditioners.findFirstEligible = async () => {
        throw new Error('connection reset');
      };

      const reading = await core.ingest.submitReading({ device_id: sensor.device_id, temperature: 30 });

      expect(core.store.readingRows.map((r) => r.id)).toEqual([reading.id]);
      expect(core.transport.ofType('sensor_reading')).toHaveLength(2);
    });

    it('should not fail the submission when a subscriber transport throws', async () => {
      core.transport.publish = () => {
        throw new Error('broker down');
      };

      await expect(core.ingest.submitReading({ device_id: sensor.device_id, temperature: 22 })).resolves.toMatchObject({
        temperature: 22,
      });
    });
  });

  describe('submitReadingsBulk', () => {
    it('should process every item in order and report each outcome', async () => {
      const result = await core.ingest.submitReadingsBulk([
        { device_id: sensor.device_id, temperature: 22 },
        { device_id: '00:00:00:00:00:00', temperature: 22 },
        { device_id: sensor.device_id },
        { device_id: sensor.device_id, temperature: 'warm' },
        { device_id: sensor.device_id, humidity: 45, timestamp: '2026-03-02T11:58:00Z' },
      ]);

      expect(result.created).toBe(2);
      expect(result.failed).toBe(3);
      expect(result.results.map((r) => (r.ok ? 'ok' : r.code))).toEqual([
        'ok',
        'sensor_not_found',
        'validation_error',
        'validation_error',
        'ok',
      ]);
      expect(core.store.readingRows).toHaveLength(2);
    });
  });
});
